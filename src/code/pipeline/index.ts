/**
 * Pipeline module exports
 */

export { formatDuration, pipelineLog } from "./debug-logger.js";
export { eventPath, validateChange } from "./event-schema.js";
export { analyzeRepository, HistoryPipeline, writeAnalysisOutputs } from "./history-pipeline.js";
export type { OutputTargets, WrittenOutputs } from "./history-pipeline.js";

export type {
  AnalysisResult,
  AnalysisStatus,
  AnalyzeRepositoryOptions,
  HistoryPipelineOptions,
  PipelineStats,
  SkippedItem,
  SkipReason,
} from "./types.js";
