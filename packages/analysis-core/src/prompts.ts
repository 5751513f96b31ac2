import type { AnalysisResult, DialogueTurn, JsonDocument } from "@callreplay/shared";

const ANALYST_PREAMBLE = `You are an expert call quality analyst for customer service phone lines.
You review conversations between customers and automated phone agents to find where the agent failed and how to fix it.

Focus on:
1. Intent recognition accuracy
2. Response relevance and helpfulness
3. Conversation flow and naturalness
4. Problem resolution
5. Customer satisfaction signals

Always respond in valid JSON with exactly the fields requested.`;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function formatConversation(dialog: readonly DialogueTurn[]): string {
  return dialog
    .map((turn, i) => `Turn ${i + 1} - ${capitalize(turn.speaker)}: ${turn.text.trim()}`)
    .join("\n");
}

function fieldOrNA(analysis: JsonDocument, key: string): string {
  const value = analysis[key];
  return value === undefined || value === null ? "N/A" : String(value);
}

export function formatAnalysis(analysis: JsonDocument): string {
  return [
    `Intent: ${fieldOrNA(analysis, "intent")}`,
    `Issue Detected: ${fieldOrNA(analysis, "issue_detected")}`,
    `Issue Reason: ${fieldOrNA(analysis, "issue_reason")}`,
    `Confidence: ${fieldOrNA(analysis, "confidence_score")}`,
  ].join("\n");
}

export function buildAnalysisPrompt(dialog: readonly DialogueTurn[]): string {
  return `${ANALYST_PREAMBLE}

ANALYZE THIS CUSTOMER SERVICE CALL:

${formatConversation(dialog)}

Respond with a JSON object containing:
- intent: what the customer was trying to accomplish
- bot_response_summary: how the bot responded across the conversation
- issue_detected: true or false
- issue_reason: what went wrong, or "No issues detected"
- suggested_fix: specific, actionable changes to the bot
- confidence_score: number between 0.0 and 1.0
- severity: "low" | "medium" | "high"
- categories: string[] of issue categories
- key_moments: [{ turn, speaker, issue }]

Respond ONLY with the JSON object, no markdown fences.`;
}

export function buildFixSuggestionPrompt(analysis: AnalysisResult | JsonDocument): string {
  return `${ANALYST_PREAMBLE}

BASED ON THIS ANALYSIS, GENERATE SPECIFIC FIXES:

${JSON.stringify(analysis, null, 2)}

Respond with a JSON object containing:
- prompt_improvements: [{ issue, current_prompt, suggested_prompt, rationale }]
- logic_improvements: [{ issue, current_behavior, suggested_behavior, implementation }]
- training_suggestions: [{ scenario, examples (string[]), expected_outcome }]
- priority: "high" | "medium" | "low"
- estimated_impact: expected improvement

Respond ONLY with the JSON object, no markdown fences.`;
}

export function buildSummaryPrompt(analyses: readonly JsonDocument[]): string {
  const body = analyses
    .map((analysis, i) => `Call ${i + 1}:\n${formatAnalysis(analysis)}`)
    .join("\n\n");

  return `${ANALYST_PREAMBLE}

SUMMARIZE THESE CALL ANALYSES:

${body}

Respond with a JSON object containing:
- common_issues: [{ issue, frequency, impact }]
- top_improvements: [{ improvement, priority, expected_benefit }]
- overall_quality_score: number between 0.0 and 1.0
- trends: patterns across calls
- recommendations: string[] of action items

Respond ONLY with the JSON object, no markdown fences.`;
}
