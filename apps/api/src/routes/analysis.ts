import type { FastifyInstance } from "fastify";
import { computeBatchStatistics, type FailureDetector } from "@callreplay/analysis-core";
import {
  BatchAnalysisRequestSchema,
  IncomingTranscriptSchema,
  JsonDocumentSchema,
  SummaryRequestSchema,
  type JsonDocument,
} from "@callreplay/shared";
import type { CallAnalyzer } from "../lib/analyzer.js";
import { sendLlmError, sendValidationError } from "../lib/http-errors.js";

export interface AnalysisRouteOptions {
  analyzer: CallAnalyzer;
  detector: FailureDetector;
}

function documentError(doc: JsonDocument): string | undefined {
  if (!("error" in doc)) return undefined;
  return typeof doc.error === "string" ? doc.error : JSON.stringify(doc.error);
}

export async function analysisRoutes(app: FastifyInstance, opts: AnalysisRouteOptions) {
  const { analyzer, detector } = opts;

  app.get("/stats", async () => analyzer.describe());

  app.post("/analyze-call", async (request, reply) => {
    const parsed = IncomingTranscriptSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    request.log.info({ call_id: parsed.data.call_id }, "analyzing call");
    const result = await analyzer.analyzeTranscript(parsed.data);
    return reply.send(result);
  });

  app.post("/analyze-batch", async (request, reply) => {
    const parsed = BatchAnalysisRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const results = await analyzer.analyzeBatch(parsed.data.transcripts);
    const summary = computeBatchStatistics(results);
    request.log.info({ summary }, "batch analysis complete");
    return reply.send({ results, summary });
  });

  app.post("/prefilter-check", async (request, reply) => {
    const parsed = IncomingTranscriptSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const verdict = detector.evaluate(parsed.data);
    return reply.send({
      call_id: parsed.data.call_id,
      would_analyze: verdict.failed,
      confidence: verdict.confidence,
      raw_score: verdict.raw_score,
      reasons: verdict.reasons,
      call_length: verdict.call_length,
    });
  });

  app.post("/generate-fixes", async (request, reply) => {
    const parsed = JsonDocumentSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const fixes = await analyzer.generateDetailedFixes(parsed.data);
    const error = documentError(fixes);
    if (error !== undefined) {
      return sendLlmError(reply, `Fix generation failed: ${error}`);
    }
    return reply.send(fixes);
  });

  app.post("/generate-summary", async (request, reply) => {
    const parsed = SummaryRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const summary = await analyzer.generateSummary(parsed.data);
    const error = documentError(summary);
    if (error !== undefined) {
      return sendLlmError(reply, `Summary generation failed: ${error}`);
    }
    return reply.send(summary);
  });
}
