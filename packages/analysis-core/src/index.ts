export {
  FailureDetector,
  FRUSTRATION_KEYWORDS,
  CONFUSION_PHRASES,
  DETECTOR_WEIGHTS,
} from "./failure-detector.js";
export {
  LLMInvoker,
  createOpenAIGenerator,
  parseStructuredReply,
  JSON_SYSTEM_INSTRUCTION,
} from "./llm.js";
export { toAnalysisResult, clamp01 } from "./analysis.js";
export { computeBatchStatistics, computePipelineStatistics } from "./statistics.js";
export {
  buildAnalysisPrompt,
  buildFixSuggestionPrompt,
  buildSummaryPrompt,
  formatConversation,
  formatAnalysis,
} from "./prompts.js";
export type {
  PrefilterVerdict,
  DetectorHit,
  FailureDetectorConfig,
  FailureDetectorSummary,
  CompletionRequest,
  TextGenerator,
  LLMInvokerConfig,
  StructuredReply,
  InvocationResult,
} from "./types.js";
