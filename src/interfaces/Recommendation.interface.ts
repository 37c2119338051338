import type { ICompositeSignal, IElementarySignal } from "./Signal.interface";
import type { IIndicatorSnapshot } from "./Indicator.interface";
import type { IPatternResult } from "./Pattern.interface";
import type { IProbabilityEstimate } from "./Oracle.interface";
import type { IRiskAssessment } from "./Risk.interface";
import type { IEntryExit } from "./EntryExit.interface";

/** Asset class derived from the declared quote source */
export type AssetClass = "crypto" | "equity" | "fund" | "unknown";

export interface IAssetIdentity {
  symbol: string;
  name: string;
  assetClass: AssetClass;
}

/**
 * Complete analysis result for one asset. Produced for every input,
 * including malformed ones, and frozen before it is returned.
 */
export interface IRecommendation {
  readonly asset: IAssetIdentity;
  readonly currentPrice: number;
  readonly signal: ICompositeSignal;
  readonly indicators: IIndicatorSnapshot;
  readonly signals: IElementarySignal[];
  readonly patterns: IPatternResult;
  /** Oracle output, null when no oracle is configured or it failed */
  readonly prediction: IProbabilityEstimate | null;
  readonly riskAssessment: IRiskAssessment;
  readonly entryExit: IEntryExit;
  readonly rationale: string;
  /** ISO-8601 time of analysis */
  readonly timestamp: string;
}
