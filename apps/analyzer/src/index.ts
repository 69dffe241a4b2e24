export {
  AnalysisEngine,
  analyzeKeypointStream,
  type AnalysisEngineOptions,
} from "./engine";
export * from "./engine/errors";
export type {
  AnalysisOutcome,
  AnalysisRunOptions,
  CancellationReason,
  FrameInput,
} from "./engine/types";
export {
  SequenceAggregator,
  compensationScore,
  type AggregationResult,
} from "./engine/aggregation/sequence-aggregator";
export { default as classifyCompensatingSide } from "./engine/classification/compensating-side";
export { default as classifySeverity } from "./engine/classification/severity";
export {
  DEFAULT_ANALYSIS_CONFIG,
  ConfigurationError,
  mergeAnalysisConfig,
  parseAnalysisConfigSurface,
  resolveAnalysisConfig,
  type AnalysisConfig,
  type AnalysisConfigOverrides,
  type OrderingPolicy,
  type SeverityBand,
} from "./engine/config/analysis-config";
export {
  computeFrameMetrics,
  computeHipShift,
  computeKneeAngle,
  computeKneeAsymmetry,
  evaluateFrame,
} from "./engine/metrics";
export { ReportBuilder } from "./engine/report/report-builder";
export { ExclusiveExtractor } from "./extraction/exclusive-extractor";
export {
  loadKeypointStream,
  parseKeypointStream,
} from "./extraction/keypoint-stream";
export {
  MEDIAPIPE_LANDMARK_INDEX,
  poseToFrame,
  poseToLandmarkSet,
} from "./extraction/pose-landmarks";
export { generateSyntheticSquat } from "./extraction/synthetic-squat";
export {
  analyzeVideo,
  extractKeypointStream,
  type VideoAnalysisResult,
} from "./extraction/video-analysis";
export * from "./shared/types/extractor";
export * from "./shared/types/landmarks";
export * from "./shared/types/metrics";
export * from "./shared/types/report";
