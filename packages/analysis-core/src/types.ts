import type { JsonDocument } from "@callreplay/shared";

/** Outcome of the heuristic prefilter for one transcript */
export interface PrefilterVerdict {
  failed: boolean;
  /** Weighted sum clamped to [0, 1] */
  confidence: number;
  reasons: string[];
  call_length: number;
  /** Weighted sum before clamping; this is what the threshold is checked against */
  raw_score: number;
}

/** Result of a single detector pass */
export interface DetectorHit {
  detected: boolean;
  reasons: string[];
}

/** Configuration for the failure prefilter */
export interface FailureDetectorConfig {
  frustrationKeywords?: readonly string[];
  confusionPhrases?: readonly string[];
  /** Bot turns shorter than this (after trim) count as very short */
  shortResponseThreshold?: number;
  /** Raw weighted sum at or above which a call is flagged */
  failureThreshold?: number;
}

export interface FailureDetectorSummary {
  frustration_keywords_count: number;
  bot_confusion_patterns_count: number;
  short_response_threshold: number;
  failure_threshold: number;
}

/** A single completion request sent to the model */
export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
}

/** Sends one completion request and resolves with the raw reply text */
export type TextGenerator = (request: CompletionRequest) => Promise<string>;

/** Configuration for the LLM invoker */
export interface LLMInvokerConfig {
  model?: string;
  apiKey?: string;
  temperature?: number;
  maxOutputTokens?: number;
  maxAttempts?: number;
  /** Fixed pause between attempts; 0 retries immediately */
  retryDelayMs?: number;
  /** Overrides the default AI SDK generator (tests, other providers) */
  generate?: TextGenerator;
}

/** JSON object parsed from a model reply */
export type StructuredReply = JsonDocument;

export type InvocationResult =
  | { ok: true; data: StructuredReply; attempts: number }
  | { ok: false; error: string; attempts: number };
