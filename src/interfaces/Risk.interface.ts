export type RiskLevel = "low" | "medium" | "high";

export interface IRiskAssessment {
  level: RiskLevel;
  score: number;
  /** Labels of every condition that added to the score, in evaluation order */
  factors: string[];
  volatility: number;
}
