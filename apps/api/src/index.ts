import "dotenv/config";
import * as Sentry from "@sentry/node";
import { FailureDetector, LLMInvoker } from "@callreplay/analysis-core";
import { buildApp } from "./app.js";
import { CallAnalyzer } from "./lib/analyzer.js";
import { TranscriptArchive } from "./lib/archive.js";
import { loadConfig } from "./lib/config.js";
import { PipelineOrchestrator } from "./lib/pipeline.js";
import { ResultStore } from "./lib/result-store.js";
import { createValkey } from "./lib/valkey.js";
import { WorkerPool } from "./lib/worker-pool.js";

const config = loadConfig();

Sentry.init({
  dsn: config.sentryDsn,
  environment: config.environment,
  tracesSampleRate: 0.1,
  enabled: config.production && Boolean(config.sentryDsn),
  beforeSend(event) {
    // Filter out health check errors
    if (event.request?.url?.includes("/health")) {
      return null;
    }
    return event;
  },
});

if (config.serializeAppends) {
  console.log("[store] appends are serialized through the store instance");
}

const detector = new FailureDetector({ shortResponseThreshold: config.shortResponseThreshold });
const invoker = new LLMInvoker(config.llm);
const store = new ResultStore({
  dataDir: config.dataDir,
  serializeAppends: config.serializeAppends,
});
const archive = new TranscriptArchive({ dataDir: config.dataDir });
const pool = new WorkerPool({ concurrency: config.pipelineConcurrency });
const analyzer = new CallAnalyzer({ detector, invoker, store });
const orchestrator = new PipelineOrchestrator({
  analyzer,
  archive,
  pool,
  background: pool,
});

const app = await buildApp(
  { detector, analyzer, orchestrator, store },
  {
    logger: {
      transport: !config.production ? { target: "pino-pretty" } : undefined,
    },
    webOrigin: config.webOrigin,
    redis: createValkey(config.valkeyUrl),
  },
);

// Let queued background analyses finish before the process exits
app.addHook("onClose", async () => {
  await pool.onIdle();
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info(`${signal} received, shutting down`);
    void app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      },
    );
  });
}

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
