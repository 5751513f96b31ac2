import {
  buildAnalysisPrompt,
  buildFixSuggestionPrompt,
  buildSummaryPrompt,
  toAnalysisResult,
  type FailureDetector,
  type FailureDetectorSummary,
  type LLMInvoker,
} from "@callreplay/analysis-core";
import type {
  AnalysisResponse,
  AnalysisResult,
  JsonDocument,
  Transcript,
} from "@callreplay/shared";
import { errorMessage } from "./errors.js";
import type { ResultStore } from "./result-store.js";

export interface CallAnalyzerDeps {
  detector: FailureDetector;
  invoker: LLMInvoker;
  store: ResultStore;
}

export interface AnalyzerSummary extends FailureDetectorSummary {
  model: string;
  temperature: number;
  max_output_tokens: number;
  max_attempts: number;
}

export const NO_ANALYSES_ERROR = "No analysis results to summarize";

/**
 * Single-transcript analysis: prefilter, then a model call for the calls
 * that look failed. Every response, skipped ones included, is appended to
 * the result store.
 */
export class CallAnalyzer {
  private readonly detector: FailureDetector;
  private readonly invoker: LLMInvoker;
  private readonly store: ResultStore;

  constructor(deps: CallAnalyzerDeps) {
    this.detector = deps.detector;
    this.invoker = deps.invoker;
    this.store = deps.store;
  }

  async analyzeTranscript(transcript: Transcript): Promise<AnalysisResponse> {
    const response = await this.evaluate(transcript);
    await this.store.append(response);
    return response;
  }

  async analyzeBatch(transcripts: readonly Transcript[]): Promise<AnalysisResponse[]> {
    const responses: AnalysisResponse[] = [];
    for (const transcript of transcripts) {
      responses.push(await this.analyzeTranscript(transcript));
    }
    return responses;
  }

  async generateDetailedFixes(analysis: AnalysisResult | JsonDocument): Promise<JsonDocument> {
    return this.invokeDocument(buildFixSuggestionPrompt(analysis), "fix generation");
  }

  async generateSummary(analyses: readonly JsonDocument[]): Promise<JsonDocument> {
    if (analyses.length === 0) {
      return { error: NO_ANALYSES_ERROR };
    }
    return this.invokeDocument(buildSummaryPrompt(analyses), "summary generation");
  }

  describe(): AnalyzerSummary {
    return {
      model: this.invoker.model,
      temperature: this.invoker.temperature,
      max_output_tokens: this.invoker.maxOutputTokens,
      max_attempts: this.invoker.maxAttempts,
      ...this.detector.describe(),
    };
  }

  private async evaluate(transcript: Transcript): Promise<AnalysisResponse> {
    const { call_id } = transcript;
    try {
      const verdict = this.detector.evaluate(transcript);
      if (!verdict.failed) {
        return {
          call_id,
          status: "skipped",
          reason: `No issues detected (confidence: ${verdict.confidence.toFixed(2)})`,
        };
      }

      const result = await this.invoker.invoke(buildAnalysisPrompt(transcript.dialog));
      if (!result.ok) {
        console.error(`[analyzer] analysis failed for call ${call_id}: ${result.error}`);
        return { call_id, status: "error", error: result.error };
      }

      const analysis = toAnalysisResult(result.data);
      console.info(
        `[analyzer] call ${call_id} analyzed (issue: ${analysis.issue_detected}, confidence: ${analysis.confidence_score})`,
      );
      return { call_id, status: "analyzed", analysis };
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[analyzer] unexpected failure for call ${call_id}: ${message}`);
      return { call_id, status: "error", error: message };
    }
  }

  private async invokeDocument(prompt: string, label: string): Promise<JsonDocument> {
    try {
      const result = await this.invoker.invoke(prompt);
      if (result.ok) return result.data;
      console.error(`[analyzer] ${label} failed: ${result.error}`);
      return { error: result.error };
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[analyzer] ${label} failed: ${message}`);
      return { error: message };
    }
  }
}
