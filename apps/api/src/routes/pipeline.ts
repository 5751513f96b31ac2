import { randomUUID } from "node:crypto";
import type { FastifyInstance } from "fastify";
import { BatchAnalysisRequestSchema, IncomingTranscriptSchema } from "@callreplay/shared";
import { sendPipelineError, sendValidationError } from "../lib/http-errors.js";
import { isPipelineFailure, type PipelineOrchestrator } from "../lib/pipeline.js";

export interface PipelineRouteOptions {
  orchestrator: PipelineOrchestrator;
}

export async function pipelineRoutes(app: FastifyInstance, opts: PipelineRouteOptions) {
  const { orchestrator } = opts;

  app.post("/pipeline/run", async (request, reply) => {
    const parsed = BatchAnalysisRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const outcome = await orchestrator.runBatch(parsed.data.transcripts);
    if (isPipelineFailure(outcome)) {
      return sendPipelineError(reply, outcome.error, outcome.pipeline_id);
    }
    return reply.send(outcome);
  });

  // Single-call ingestion from the telephony provider
  app.post("/webhook", async (request, reply) => {
    const parsed = IncomingTranscriptSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const webhookId = `webhook_${randomUUID()}`;
    const ack = await orchestrator.ingest(parsed.data, parsed.data.metadata);
    request.log.info({ webhook_id: webhookId, call_id: ack.call_id, status: ack.status }, "webhook received");
    return reply.send({ ...ack, webhook_id: webhookId });
  });
}
