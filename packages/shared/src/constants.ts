export const SPEAKERS = ["user", "bot"] as const;
export type Speaker = (typeof SPEAKERS)[number];

export const ANALYSIS_STATUSES = ["analyzed", "skipped", "error"] as const;
export type AnalysisStatus = (typeof ANALYSIS_STATUSES)[number];

export const INGEST_STATUSES = ["received", "received_and_analyzing"] as const;
export type IngestStatus = (typeof INGEST_STATUSES)[number];

/** Metadata status that makes ingestion schedule a background analysis. */
export const FAILED_CALL_STATUS = "failed";

// ── Analysis defaults ─────────────────────────────────────────

/** Values used for any field the model leaves out of its reply. */
export const ANALYSIS_DEFAULTS = {
  intent: "Unknown",
  bot_response_summary: "No summary",
  issue_detected: false,
  issue_reason: "No issues detected",
  suggested_fix: "No suggestions",
  confidence_score: 0.5,
} as const;

// ── History queries ───────────────────────────────────────────

export const HISTORY_LIMIT = {
  min: 1,
  max: 1000,
} as const;

export const STATS_PREVIEW_CALL_IDS = 10;
