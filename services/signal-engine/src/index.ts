/**
 * Signal Engine - public surface
 */

export * from './types';

export {
  EngineConfigSchema,
  EngineConfig,
  EngineConfigInput,
  StatWindowConfig,
  AnomalyConfig,
  MetricThresholds,
  TrendConsistencyConfig,
  ConfirmationConfig,
  ScoringConfig,
  GuardrailConfig,
  EmissionConfig,
  DominanceConfig,
  RiskConfig,
} from './config/schema';
export {
  ConfigValidationError,
  createEngineConfig,
  loadConfigFromEnvironment,
  loadConfigFromFile,
  loadEngineConfig,
  mergeConfig,
} from './config/ConfigLoader';

export { StatWindowCalculator } from './engine/StatWindowCalculator';
export { AnomalyDetector } from './engine/AnomalyDetector';
export { TrendConsistencyChecker } from './engine/TrendConsistencyChecker';
export { ConfirmationScorer, metricBias } from './engine/ConfirmationScorer';
export { MultiFactorScorer, ScoringInput } from './engine/MultiFactorScorer';
export { GuardrailFilter } from './engine/GuardrailFilter';

export { TechnicalIndicators } from './analysis/TechnicalIndicators';
export { MarketStructure } from './analysis/MarketStructure';
export { calculateTechnicalScore, TECHNICAL_WEIGHTS } from './analysis/TechnicalScore';
export { analyzeAsset, analyzeTimeframe } from './analysis/TimeframeAnalyzer';

export { InMemorySignalHistoryStore, SignalHistoryStore } from './emission/SignalHistoryStore';
export {
  decideEmission,
  EmissionController,
  EmissionControllerDeps,
  EmissionRequest,
  relativeChange,
} from './emission/EmissionController';

export {
  DominanceSignalDetector,
  MARKET_FLOW_KEY,
  MarketEvaluation,
  MarketSnapshot,
  MetricReading,
  SuppressedMarketSignal,
} from './detectors/DominanceSignalDetector';

export { EventMap, SignalEventBus } from './events/SignalEventBus';

export {
  AssetDecision,
  AssetEvaluationInput,
  AssetOutcome,
  assetSignalKey,
  MarketSnapshotInput,
  SignalEngine,
  SignalEngineDeps,
  TradeLevels,
} from './SignalEngine';
