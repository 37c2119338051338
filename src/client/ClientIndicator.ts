import { IEngineParams } from "../interfaces/Advisor.interface";
import { IPriceBar } from "../interfaces/Candle.interface";
import { IIndicatorSnapshot } from "../interfaces/Indicator.interface";
import {
  bollingerBands,
  bollingerPosition,
  macd,
  rsi,
  sma,
  supportResistance,
  volatility,
  volumeAnalysis,
} from "../math/indicator.math";

const last = (values: number[]) =>
  values.length ? values[values.length - 1] : null;

/**
 * Reads the trailing value of every indicator for the last bar.
 *
 * Indicators that could not be computed from the available bars are left
 * out of the snapshot, so the rules and the risk score skip them.
 */
export class ClientIndicator {
  constructor(readonly params: IEngineParams) {}

  /**
   * Builds the indicator snapshot over a price series.
   *
   * @param bars - Usable bars, oldest first, at least one
   */
  public getSnapshot = (bars: IPriceBar[]): IIndicatorSnapshot => {
    const { config } = this.params;

    this.params.logger.debug("ClientIndicator getSnapshot", {
      bars: bars.length,
    });

    const closes = bars.map(({ close }) => close);
    const highs = bars.map(({ high }) => high);
    const lows = bars.map(({ low }) => low);
    const volumes = bars.map(({ volume }) => volume);
    const price = closes[closes.length - 1];

    const snapshot: IIndicatorSnapshot = {
      volatility: volatility(closes, config.CC_VOLATILITY_PERIOD),
    };

    const rsiValue = last(rsi(closes, config.CC_RSI_PERIOD));
    if (rsiValue !== null) {
      snapshot.rsi = rsiValue;
    }

    {
      const result = macd(
        closes,
        config.CC_MACD_FAST,
        config.CC_MACD_SLOW,
        config.CC_MACD_SIGNAL
      );
      const macdValue = last(result.macd);
      const signalValue = last(result.signal);
      if (macdValue !== null && signalValue !== null) {
        snapshot.macd = {
          macd: macdValue,
          signal: signalValue,
          histogram: last(result.histogram) ?? 0,
        };
      }
    }

    {
      const bands = bollingerBands(closes, config.CC_BB_PERIOD, config.CC_BB_STD);
      const upper = last(bands.upper);
      const middle = last(bands.middle);
      const lower = last(bands.lower);
      if (upper !== null && middle !== null && lower !== null) {
        snapshot.bollingerBands = {
          upper,
          middle,
          lower,
          position: bollingerPosition(price, upper, lower),
        };
      }
    }

    {
      const smaShort = last(sma(closes, config.CC_SMA_SHORT));
      const smaLong = last(sma(closes, config.CC_SMA_LONG));
      if (smaShort !== null && smaLong !== null) {
        snapshot.movingAverages = {
          smaShort,
          smaLong,
          priceVsSmaShort: smaShort !== 0 ? price / smaShort : 1,
          priceVsSmaLong: smaLong !== 0 ? price / smaLong : 1,
        };
      }
    }

    if (volumes.length >= config.CC_VOLUME_PERIOD) {
      snapshot.volume = volumeAnalysis(
        volumes,
        config.CC_VOLUME_PERIOD,
        config.CC_VOLUME_THRESHOLD
      );
    }

    if (bars.length >= config.CC_SUPPORT_RESISTANCE_WINDOW * 2 + 1) {
      snapshot.supportResistance = supportResistance(
        closes,
        highs,
        lows,
        config.CC_SUPPORT_RESISTANCE_WINDOW
      );
    }

    return snapshot;
  };
}

export default ClientIndicator;
