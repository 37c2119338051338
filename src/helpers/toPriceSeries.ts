import { IPriceBar, PriceSeries } from "../interfaces/Candle.interface";
import { IAssetIdentity } from "../interfaces/Recommendation.interface";
import { AssetLike } from "../interfaces/Asset.interface";
import {
  AssetHistorySchema,
  AssetIdentitySchema,
  AssetSchema,
  PriceBarSchema,
  TAssetSchema,
} from "../schema/Asset.schema";

/** Identity reported for records that match no quote variant */
const UNKNOWN_IDENTITY: IAssetIdentity = {
  symbol: "",
  name: "",
  assetClass: "unknown",
};

/**
 * Open, high, low and close must be strictly positive.
 */
const IS_USABLE_FN = (bar: IPriceBar) =>
  bar.open > 0 && bar.high > 0 && bar.low > 0 && bar.close > 0;

/**
 * Builds the single bar that stands for a point-in-time quote.
 */
const CREATE_QUOTE_BAR_FN = (asset: TAssetSchema): IPriceBar => {
  if (asset.source === "crypto") {
    const price = asset.quote.current_price;
    return {
      open: price,
      high: asset.quote.high_24h || price,
      low: asset.quote.low_24h || price,
      close: price,
      volume: asset.quote.total_volume || 0,
    };
  }
  if (asset.source === "equity") {
    const price = asset.quote.close;
    return {
      open: asset.quote.open || price,
      high: asset.quote.high || price,
      low: asset.quote.low || price,
      close: price,
      volume: asset.quote.volume || 0,
    };
  }
  const nav = asset.quote.nav;
  return {
    open: nav,
    high: nav,
    low: nav,
    close: nav,
    volume: 1,
  };
};

/**
 * Reads symbol, name and asset class from an asset record.
 *
 * Only the identity fields are checked here, so a quote with unreadable
 * prices still reports its symbol. Crypto symbols are upper-cased.
 *
 * @example
 * ```typescript
 * toAssetIdentity({ source: "crypto", quote: { symbol: "btc", name: "Bitcoin", current_price: 1 } });
 * // { symbol: "BTC", name: "Bitcoin", assetClass: "crypto" }
 * ```
 */
export const toAssetIdentity = (asset: AssetLike): IAssetIdentity => {
  const result = AssetIdentitySchema.safeParse(asset);
  if (!result.success) {
    return { ...UNKNOWN_IDENTITY };
  }
  const { data } = result;
  if (data.source === "crypto") {
    return {
      symbol: data.quote.symbol.toUpperCase(),
      name: data.quote.name ?? "",
      assetClass: "crypto",
    };
  }
  if (data.source === "equity") {
    return {
      symbol: data.quote.code,
      name: data.quote.name ?? "",
      assetClass: "equity",
    };
  }
  return {
    symbol: data.quote.fundcode,
    name: data.quote.name ?? "",
    assetClass: "fund",
  };
};

/**
 * Converts an asset record into a price series, oldest bar first.
 *
 * A non-empty `history` wins: its well-formed bars with positive prices form
 * the series, whatever the quote prices say. Without history the quote
 * becomes a single bar. A record that matches no quote variant yields an
 * empty series.
 */
export const toPriceSeries = (asset: AssetLike): PriceSeries => {
  if (!AssetIdentitySchema.safeParse(asset).success) {
    return [];
  }
  const history = AssetHistorySchema.safeParse(asset);
  if (history.success) {
    const bars: PriceSeries = [];
    for (const item of history.data.history) {
      const bar = PriceBarSchema.safeParse(item);
      if (bar.success && IS_USABLE_FN(bar.data)) {
        bars.push(bar.data);
      }
    }
    return bars;
  }
  const result = AssetSchema.safeParse(asset);
  if (!result.success) {
    return [];
  }
  const bar = CREATE_QUOTE_BAR_FN(result.data);
  return IS_USABLE_FN(bar) ? [bar] : [];
};

export default toPriceSeries;
