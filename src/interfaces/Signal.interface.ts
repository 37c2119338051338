/** Direction of a single indicator rule */
export type SignalDirection = "buy" | "sell";

export type SignalStrength = "weak" | "medium" | "strong";

/** Final classification of the aggregated score */
export type SignalType = "strong_buy" | "buy" | "hold" | "sell" | "strong_sell";

export type SignalConfidence = "low" | "medium" | "high";

/**
 * Directional suggestion produced by one indicator rule before aggregation.
 */
export interface IElementarySignal {
  direction: SignalDirection;
  reason: string;
  strength: SignalStrength;
}

/**
 * Aggregate of all elementary signals plus the oracle weight.
 */
export interface ICompositeSignal {
  type: SignalType;
  /** Absolute value of totalScore */
  strength: number;
  confidence: SignalConfidence;
  buyCount: number;
  sellCount: number;
  /** Weight contributed by the probability oracle, 0 when it is absent */
  mlContribution: number;
  totalScore: number;
}
