import { computeBatchStatistics, computePipelineStatistics } from "@callreplay/analysis-core";
import {
  FAILED_CALL_STATUS,
  type AnalysisResponse,
  type AnalyzedResponse,
  type BatchStatistics,
  type IngestAck,
  type JsonDocument,
  type PipelineFailure,
  type PipelineResult,
  type Transcript,
} from "@callreplay/shared";
import type { CallAnalyzer } from "./analyzer.js";
import type { TranscriptArchive } from "./archive.js";
import { errorMessage } from "./errors.js";
import { compactTimestamp } from "./time.js";
import type { TaskQueue, WorkerPool } from "./worker-pool.js";

export interface PipelineOrchestratorDeps {
  analyzer: CallAnalyzer;
  archive: TranscriptArchive;
  /** Runs batch analyses and fix generation */
  pool: WorkerPool;
  /** Receives background analyses scheduled by ingest */
  background: TaskQueue;
  now?: () => Date;
}

export function isPipelineFailure(
  outcome: PipelineResult | PipelineFailure,
): outcome is PipelineFailure {
  return "error" in outcome;
}

export class PipelineOrchestrator {
  private readonly analyzer: CallAnalyzer;
  private readonly archive: TranscriptArchive;
  private readonly pool: WorkerPool;
  private readonly background: TaskQueue;
  private readonly now: () => Date;

  constructor(deps: PipelineOrchestratorDeps) {
    this.analyzer = deps.analyzer;
    this.archive = deps.archive;
    this.pool = deps.pool;
    this.background = deps.background;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Analyze, generate fixes for flagged calls, summarize, then archive the
   * whole result. Per-call and per-step failures stay inside the result;
   * only an archive failure turns the run into a PipelineFailure.
   */
  async runBatch(transcripts: readonly Transcript[]): Promise<PipelineResult | PipelineFailure> {
    const startedAt = this.now();
    const pipelineId = `pipeline_${compactTimestamp(startedAt)}`;
    console.info(`[pipeline] ${pipelineId} started with ${transcripts.length} transcripts`);

    try {
      const analysisResults = await this.pool.map(transcripts, (transcript) =>
        this.analyzeIsolated(transcript),
      );
      const fixResults = await this.generateFixes(analysisResults);

      const analyses = analysisResults.flatMap((response) =>
        response.status === "analyzed" ? [response.analysis] : [],
      );
      const summary = await this.analyzer.generateSummary(analyses);

      const result: PipelineResult = {
        pipeline_id: pipelineId,
        timestamp: startedAt.toISOString(),
        input_count: transcripts.length,
        analysis_results: analysisResults,
        fix_results: fixResults,
        summary,
        statistics: computePipelineStatistics(analysisResults),
      };

      await this.archive.savePipelineResult(result);
      console.info(`[pipeline] ${pipelineId} completed`);
      return result;
    } catch (err) {
      const error = errorMessage(err);
      console.error(`[pipeline] ${pipelineId} failed: ${error}`);
      return { error, pipeline_id: pipelineId };
    }
  }

  /**
   * Archive a single transcript. Calls whose metadata marks them failed get
   * a background analysis; the caller never waits for it.
   */
  async ingest(transcript: Transcript, metadata?: JsonDocument): Promise<IngestAck> {
    const received: Transcript = metadata === undefined ? transcript : { ...transcript, metadata };
    const { call_id } = received;

    await this.archive.saveTranscript(received);

    if (received.metadata?.status === FAILED_CALL_STATUS) {
      const handle = this.background.enqueue(`analyze:${call_id}`, () =>
        this.analyzer.analyzeTranscript(received),
      );
      console.info(`[pipeline] queued background analysis ${handle.id} for call ${call_id}`);
      return {
        status: "received_and_analyzing",
        call_id,
        message: "Transcript received and analysis started",
      };
    }

    return { status: "received", call_id, message: "Transcript received and stored" };
  }

  getStats(responses: readonly AnalysisResponse[]): BatchStatistics {
    return computeBatchStatistics(responses);
  }

  private analyzeIsolated(transcript: Transcript): Promise<AnalysisResponse> {
    return this.analyzer.analyzeTranscript(transcript).catch(
      (err: unknown): AnalysisResponse => ({
        call_id: transcript.call_id,
        status: "error",
        error: errorMessage(err),
      }),
    );
  }

  private async generateFixes(
    responses: readonly AnalysisResponse[],
  ): Promise<Record<string, JsonDocument>> {
    const flagged = responses.filter(
      (response): response is AnalyzedResponse =>
        response.status === "analyzed" && response.analysis.issue_detected,
    );

    const documents = await this.pool.map(flagged, (response) =>
      this.analyzer
        .generateDetailedFixes(response.analysis)
        .catch((err: unknown): JsonDocument => ({ error: errorMessage(err) })),
    );

    const fixResults: Record<string, JsonDocument> = {};
    flagged.forEach((response, index) => {
      fixResults[response.call_id] = documents[index];
    });
    return fixResults;
  }
}
