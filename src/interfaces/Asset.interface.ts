import type { IPriceBar } from "./Candle.interface";

/** Crypto quote, field names as published by the crypto price feed */
export interface ICryptoQuote {
  symbol: string;
  name?: string;
  current_price: number;
  high_24h?: number;
  low_24h?: number;
  total_volume?: number;
}

/** Exchange-listed equity quote */
export interface IEquityQuote {
  code: string;
  name?: string;
  close: number;
  open?: number;
  high?: number;
  low?: number;
  volume?: number;
}

/** Mutual fund quote, `nav` is the latest net asset value per unit */
export interface IFundQuote {
  fundcode: string;
  name?: string;
  nav: number;
}

/**
 * Asset input, discriminated by the declared quote source.
 * `history` is the caller-supplied price series, oldest first. When it is
 * non-empty the bars come from it alone and the quote only names the asset.
 */
export type IAssetInput =
  | { source: "crypto"; quote: ICryptoQuote; history?: IPriceBar[] }
  | { source: "equity"; quote: IEquityQuote; history?: IPriceBar[] }
  | { source: "fund"; quote: IFundQuote; history?: IPriceBar[] };

/** Source tag of an asset input */
export type AssetSource = IAssetInput["source"];

/**
 * Anything a caller may hand over. Records that do not match IAssetInput are
 * analysed as unknown assets with no price data.
 */
export type AssetLike = IAssetInput | Record<string, unknown>;
