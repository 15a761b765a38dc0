export { AnnotationStore, DetectionIndex, assertAnnotationDataset, parseAnnotationDataset } from './annotations/store.js';
export {
  getEvaluationConfig,
  loadConfigFromFile,
  parseConfig,
  validateConfig,
  validateEvaluationConfig,
  type AreaRangeConfig,
  type EngineConfig,
  type EvaluationConfig,
  type ThresholdRangeConfig
} from './config/index.js';
export {
  SingleProcessCollective,
  createLocalCollectiveGroup,
  type Collective
} from './distributed/collective.js';
export { ConfigurationError, InputContractError, UnsupportedIoUTypeError } from './errors.js';
export { boxArea, boxToCorners, computeIouMatrix, cornersToBox, IouMatrix } from './evaluation/boxes.js';
export {
  DetectionEvaluator,
  type ComputeOptions,
  type DetectionEvaluatorOptions,
  type GroundTruthSource
} from './evaluation/evaluator.js';
export {
  UNMATCHED,
  evaluateImage,
  evaluateImages,
  type EvaluationTensor,
  type ImageEvaluation
} from './evaluation/imageEvaluator.js';
export { mergeEvaluations, type PartialEvaluationState, type TensorLayout } from './evaluation/merge.js';
export {
  DEFAULT_EVALUATION_CONFIG,
  createEvaluationParams,
  linspace,
  type AreaRange,
  type EvaluationParams
} from './evaluation/params.js';
export {
  BOX_METRICS,
  deriveResults,
  formatCategoryTable,
  type CategoryAveragePrecision,
  type SummaryMetrics
} from './evaluation/report.js';
export { ResultFormatter, assertBoxIouType, type PredictionBatch } from './evaluation/resultFormatter.js';
export {
  accumulateEvaluations,
  categoryAveragePrecision,
  summarizeEvaluation,
  type AccumulatedEvaluation,
  type EvaluationSummary
} from './evaluation/statistics.js';
export {
  default as logger,
  getAvailableLogLevels,
  getLogLevel,
  getLogLevelMetrics,
  onLogLevelChange,
  setLogLevel,
  type Logger
} from './logger.js';
export { default as metrics, MetricsRegistry, type MetricsSnapshot } from './metrics/index.js';
export type * from './types.js';
