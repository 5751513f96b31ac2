import { z } from "zod";
import { ANALYSIS_STATUSES, HISTORY_LIMIT, INGEST_STATUSES, SPEAKERS } from "./constants.js";

/** Open JSON object returned by the model or written to disk. */
export const JsonDocumentSchema = z.record(z.string(), z.unknown());
export type JsonDocument = z.infer<typeof JsonDocumentSchema>;

// ── Transcript ────────────────────────────────────────────────

export const DialogueTurnSchema = z
  .object({
    speaker: z.enum(SPEAKERS),
    text: z.string(),
    timestamp: z.string().optional(),
  })
  .readonly();

export const TranscriptSchema = z.object({
  call_id: z.string(),
  dialog: z.array(DialogueTurnSchema),
  metadata: JsonDocumentSchema.optional(),
});

/** Shape accepted at the HTTP boundary: a real id and at least one turn. */
export const IncomingTranscriptSchema = TranscriptSchema.extend({
  call_id: z.string().trim().min(1),
  dialog: z.array(DialogueTurnSchema).min(1),
});

export type DialogueTurn = z.infer<typeof DialogueTurnSchema>;
export type Transcript = z.infer<typeof TranscriptSchema>;

// ── Analysis ──────────────────────────────────────────────────

export const AnalysisResultSchema = z.object({
  intent: z.string(),
  bot_response_summary: z.string(),
  issue_detected: z.boolean(),
  issue_reason: z.string(),
  suggested_fix: z.string(),
  confidence_score: z.number().min(0).max(1),
});

export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;

export const AnalyzedResponseSchema = z.object({
  call_id: z.string(),
  status: z.literal("analyzed"),
  analysis: AnalysisResultSchema,
});

export const SkippedResponseSchema = z.object({
  call_id: z.string(),
  status: z.literal("skipped"),
  reason: z.string(),
});

export const ErrorResponseSchema = z.object({
  call_id: z.string(),
  status: z.literal("error"),
  error: z.string(),
});

export const AnalysisResponseSchema = z.discriminatedUnion("status", [
  AnalyzedResponseSchema,
  SkippedResponseSchema,
  ErrorResponseSchema,
]);

export type AnalyzedResponse = z.infer<typeof AnalyzedResponseSchema>;
export type AnalysisResponse = z.infer<typeof AnalysisResponseSchema>;

// ── Stored records ────────────────────────────────────────────

const recordTimestamp = { timestamp: z.string().optional() };

export const AnalysisRecordSchema = z.discriminatedUnion("status", [
  AnalyzedResponseSchema.extend(recordTimestamp),
  SkippedResponseSchema.extend(recordTimestamp),
  ErrorResponseSchema.extend(recordTimestamp),
]);

export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;

// ── Statistics ────────────────────────────────────────────────

export const BatchStatisticsSchema = z.object({
  total: z.number().int().nonnegative(),
  analyzed: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  errors: z.number().int().nonnegative(),
  issues_detected: z.number().int().nonnegative(),
  issue_rate: z.number(),
  average_confidence: z.number(),
  success_rate: z.number(),
});

export const PipelineStatisticsSchema = BatchStatisticsSchema.extend({
  processing_efficiency: z.number(),
});

export type BatchStatistics = z.infer<typeof BatchStatisticsSchema>;
export type PipelineStatistics = z.infer<typeof PipelineStatisticsSchema>;

// ── Pipeline ──────────────────────────────────────────────────

export const PipelineResultSchema = z.object({
  pipeline_id: z.string(),
  timestamp: z.string(),
  input_count: z.number().int().nonnegative(),
  analysis_results: z.array(AnalysisResponseSchema),
  fix_results: z.record(z.string(), JsonDocumentSchema),
  summary: JsonDocumentSchema,
  statistics: PipelineStatisticsSchema,
});

export type PipelineResult = z.infer<typeof PipelineResultSchema>;

export interface PipelineFailure {
  error: string;
  pipeline_id: string;
}

export interface IngestAck {
  status: (typeof INGEST_STATUSES)[number];
  call_id: string;
  message: string;
}

// ── Requests ──────────────────────────────────────────────────

export const BatchAnalysisRequestSchema = z.object({
  transcripts: z.array(IncomingTranscriptSchema).min(1),
});

export const SummaryRequestSchema = z.array(JsonDocumentSchema).min(1);

export const HistoryQuerySchema = z.object({
  start_date: z.iso.datetime({ offset: true }).optional(),
  end_date: z.iso.datetime({ offset: true }).optional(),
  call_id: z.string().min(1).optional(),
  status: z.enum(ANALYSIS_STATUSES).optional(),
  limit: z.coerce.number().int().min(HISTORY_LIMIT.min).max(HISTORY_LIMIT.max).optional(),
});

export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;

export const BackupRequestSchema = z
  .object({
    path: z.string().min(1).optional(),
  })
  .default({});
