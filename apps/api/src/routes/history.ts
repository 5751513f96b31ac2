import type { FastifyInstance } from "fastify";
import { BackupRequestSchema, HistoryQuerySchema } from "@callreplay/shared";
import { sendStorageError, sendValidationError } from "../lib/http-errors.js";
import type { ResultStore } from "../lib/result-store.js";

export interface HistoryRouteOptions {
  store: ResultStore;
}

export async function historyRoutes(app: FastifyInstance, opts: HistoryRouteOptions) {
  const { store } = opts;

  app.get("/analysis-history", async (request, reply) => {
    const parsed = HistoryQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const results = await store.query(parsed.data);
    return reply.send({
      total_results: results.length,
      filters: parsed.data,
      results,
    });
  });

  app.get("/analysis-stats", async () => store.stats());

  app.delete("/analysis-history", async (_request, reply) => {
    const cleared = await store.clear();
    if (!cleared) {
      return sendStorageError(reply, "Failed to clear analysis history");
    }
    return reply.send({ success: true, message: "Analysis history cleared" });
  });

  app.post("/analysis-history/backup", async (request, reply) => {
    const parsed = BackupRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const saved = await store.backup(parsed.data.path);
    if (!saved) {
      return sendStorageError(reply, "Backup failed: no analysis data or the target is not writable");
    }
    return reply.send({ success: true, message: "Backup created" });
  });
}
