import { IEngineParams } from "../interfaces/Advisor.interface";
import { IEntryExit } from "../interfaces/EntryExit.interface";
import { SignalType } from "../interfaces/Signal.interface";
import { roundPrecision } from "../utils/roundPrecision";

const EMPTY_ENTRY_EXIT: IEntryExit = {
  entryPrice: 0,
  stopLoss: 0,
  takeProfit: 0,
  riskRewardRatio: 0,
};

/**
 * Derives entry, stop-loss and take-profit levels from the signal direction.
 *
 * Long side for buy signals, short side for sell signals. A hold keeps the
 * long-side stop and target around an entry at the current price.
 */
export class ClientEntryExit {
  constructor(readonly params: IEngineParams) {}

  /**
   * @param price - Current price
   * @param type - Composite signal type
   *
   * @example
   * ```typescript
   * client.calculate(100, "buy");
   * // { entryPrice: 99.5, stopLoss: 95, takeProfit: 115, riskRewardRatio: 3.44 }
   * ```
   */
  public calculate = (price: number, type: SignalType): IEntryExit => {
    const { config } = this.params;

    this.params.logger.debug("ClientEntryExit calculate", { price, type });

    if (!(price > 0)) {
      return { ...EMPTY_ENTRY_EXIT };
    }

    let entryPrice: number;
    let stopLoss: number;
    let takeProfit: number;

    if (type === "buy" || type === "strong_buy") {
      entryPrice = price * (1 - config.CC_ENTRY_OFFSET_PERCENT);
      stopLoss = price * (1 - config.CC_STOP_LOSS_PERCENT);
      takeProfit = price * (1 + config.CC_TAKE_PROFIT_PERCENT);
    } else if (type === "sell" || type === "strong_sell") {
      entryPrice = price * (1 + config.CC_ENTRY_OFFSET_PERCENT);
      stopLoss = price * (1 + config.CC_STOP_LOSS_PERCENT);
      takeProfit = price * (1 - config.CC_TAKE_PROFIT_PERCENT);
    } else {
      entryPrice = price;
      stopLoss = price * (1 - config.CC_STOP_LOSS_PERCENT);
      takeProfit = price * (1 + config.CC_TAKE_PROFIT_PERCENT);
    }

    const risk = Math.abs(entryPrice - stopLoss);
    const reward = Math.abs(takeProfit - entryPrice);

    return {
      entryPrice: roundPrecision(entryPrice, config.CC_PRICE_PRECISION),
      stopLoss: roundPrecision(stopLoss, config.CC_PRICE_PRECISION),
      takeProfit: roundPrecision(takeProfit, config.CC_PRICE_PRECISION),
      riskRewardRatio:
        risk !== 0 ? roundPrecision(reward / risk, config.CC_RATIO_PRECISION) : 0,
    };
  };
}

export default ClientEntryExit;
