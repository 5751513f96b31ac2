import { ANALYSIS_DEFAULTS, type AnalysisResult, type JsonDocument } from "@callreplay/shared";

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  if (value < 0) {
    return 0;
  }
  if (value > 1) {
    return 1;
  }
  return value;
}

function stringField(reply: JsonDocument, key: keyof AnalysisResult, fallback: string): string {
  const value = reply[key];
  return typeof value === "string" ? value : fallback;
}

/**
 * Map a model reply onto an AnalysisResult. Missing or mistyped fields fall
 * back to ANALYSIS_DEFAULTS; the confidence is clamped to [0, 1].
 */
export function toAnalysisResult(reply: JsonDocument): AnalysisResult {
  const issueDetected = reply.issue_detected;
  const confidence = reply.confidence_score;

  return {
    intent: stringField(reply, "intent", ANALYSIS_DEFAULTS.intent),
    bot_response_summary: stringField(
      reply,
      "bot_response_summary",
      ANALYSIS_DEFAULTS.bot_response_summary,
    ),
    issue_detected:
      typeof issueDetected === "boolean" ? issueDetected : ANALYSIS_DEFAULTS.issue_detected,
    issue_reason: stringField(reply, "issue_reason", ANALYSIS_DEFAULTS.issue_reason),
    suggested_fix: stringField(reply, "suggested_fix", ANALYSIS_DEFAULTS.suggested_fix),
    confidence_score:
      typeof confidence === "number" ? clamp01(confidence) : ANALYSIS_DEFAULTS.confidence_score,
  };
}
