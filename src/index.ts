export {
  setLogger,
  setConfig,
  getConfig,
  getDefaultConfig,
} from "./function/setup";
export { addAdvisor } from "./function/add";
export { listAdvisors } from "./function/list";
export {
  getRecommendation,
  getRecommendations,
} from "./function/recommend";
export {
  listenRecommendation,
  listenRecommendationOnce,
  listenError,
} from "./function/event";

export {
  sma,
  ema,
  rsi,
  macd,
  bollingerBands,
  bollingerPosition,
  volumeAnalysis,
  supportResistance,
  volatility,
} from "./math/indicator.math";
export {
  isHammer,
  isDoji,
  isBullishEngulfing,
  isBearishEngulfing,
  detectPatterns,
} from "./math/pattern.math";
export { buildFeatureVector } from "./math/feature.math";
export { toAssetIdentity, toPriceSeries } from "./helpers/toPriceSeries";

export { ClientAdvisor } from "./client/ClientAdvisor";
export { ClientIndicator } from "./client/ClientIndicator";
export { ClientSignal } from "./client/ClientSignal";
export { ClientRisk } from "./client/ClientRisk";
export { ClientEntryExit } from "./client/ClientEntryExit";
export { LogisticOracle } from "./classes/LogisticOracle";

export type { ILogger } from "./interfaces/Logger.interface";
export type { IPriceBar, PriceSeries } from "./interfaces/Candle.interface";
export type {
  IMacdResult,
  IBollingerResult,
  IVolumeAnalysis,
  ISupportResistance,
  IIndicatorSnapshot,
} from "./interfaces/Indicator.interface";
export type {
  PatternName,
  PatternBias,
  IPatternResult,
} from "./interfaces/Pattern.interface";
export type {
  SignalDirection,
  SignalStrength,
  SignalType,
  SignalConfidence,
  IElementarySignal,
  ICompositeSignal,
} from "./interfaces/Signal.interface";
export type { RiskLevel, IRiskAssessment } from "./interfaces/Risk.interface";
export type { IEntryExit } from "./interfaces/EntryExit.interface";
export { FEATURE_NAMES } from "./interfaces/Oracle.interface";
export type {
  FeatureName,
  IFeatureVector,
  IProbabilityEstimate,
  IProbabilityOracle,
  ILogisticModel,
} from "./interfaces/Oracle.interface";
export type {
  AssetClass,
  IAssetIdentity,
  IRecommendation,
} from "./interfaces/Recommendation.interface";
export type {
  ICryptoQuote,
  IEquityQuote,
  IFundQuote,
  IAssetInput,
  AssetSource,
  AssetLike,
} from "./interfaces/Asset.interface";
export type {
  AdvisorName,
  IAdvisorCallbacks,
  IAdvisorSchema,
  IAdvisorParams,
  IEngineParams,
} from "./interfaces/Advisor.interface";
export type { RecommendationContract } from "./contract/Recommendation.contract";

export * as emitters from "./config/emitters";

export { DEFAULT_ADVISOR_NAME, type GlobalConfig } from "./config/params";

export { lib } from "./lib";
