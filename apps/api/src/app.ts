import * as Sentry from "@sentry/node";
import Fastify, { type FastifyError, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import type { Redis } from "ioredis";
import type { FailureDetector } from "@callreplay/analysis-core";
import type { CallAnalyzer } from "./lib/analyzer.js";
import type { PipelineOrchestrator } from "./lib/pipeline.js";
import { registerRateLimit } from "./lib/rate-limit.js";
import type { ResultStore } from "./lib/result-store.js";
import { analysisRoutes } from "./routes/analysis.js";
import { historyRoutes } from "./routes/history.js";
import { pipelineRoutes } from "./routes/pipeline.js";

export const SERVICE_NAME = "call-replay-analyzer";

export interface AppDeps {
  detector: FailureDetector;
  analyzer: CallAnalyzer;
  orchestrator: PipelineOrchestrator;
  store: ResultStore;
}

export interface AppOptions {
  logger?: FastifyServerOptions["logger"];
  webOrigin?: string;
  redis?: Redis | null;
}

export async function buildApp(deps: AppDeps, options: AppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? false });

  await app.register(cors, {
    origin: options.webOrigin ?? "*",
    methods: ["GET", "HEAD", "POST", "DELETE", "OPTIONS"],
  });

  await registerRateLimit(app, options.redis ?? null);

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode =
      typeof error.statusCode === "number" && error.statusCode >= 400 ? error.statusCode : 500;

    Sentry.captureException(error, {
      contexts: {
        fastify: {
          method: request.method,
          url: request.url,
          route: request.routeOptions.url,
        },
      },
      tags: {
        route: request.routeOptions.url ?? request.url,
        method: request.method,
        status_code: statusCode,
      },
      level: statusCode < 500 ? "warning" : "error",
    });

    request.log.error(error);

    return reply.status(statusCode).send({
      error: error.message || "Internal Server Error",
      statusCode,
    });
  });

  app.get("/", async () => ({
    message: "Call Replay Analyzer API",
    version: "0.1.0",
    status: "ok",
    endpoints: {
      analyze_single: "/analyze-call",
      analyze_batch: "/analyze-batch",
      prefilter_check: "/prefilter-check",
      generate_fixes: "/generate-fixes",
      generate_summary: "/generate-summary",
      pipeline: "/pipeline/run",
      webhook: "/webhook",
      history: "/analysis-history",
      history_stats: "/analysis-stats",
      stats: "/stats",
      health: "/health",
    },
  }));

  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
    service: SERVICE_NAME,
  }));

  await app.register(analysisRoutes, { analyzer: deps.analyzer, detector: deps.detector });
  await app.register(pipelineRoutes, { orchestrator: deps.orchestrator });
  await app.register(historyRoutes, { store: deps.store });

  return app;
}
