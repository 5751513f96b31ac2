import type { FastifyInstance, FastifyRequest } from "fastify";
import rateLimit from "@fastify/rate-limit";
import type { Redis } from "ioredis";

/**
 * Per-route rate limit overrides for the model-backed endpoints.
 * Keyed by route URL pattern (must match the registered route).
 */
export const ROUTE_LIMITS: Record<string, { max: number; timeWindow: string }> = {
  "/analyze-call": { max: 30, timeWindow: "1 minute" },
  "/analyze-batch": { max: 10, timeWindow: "1 minute" },
  "/generate-fixes": { max: 20, timeWindow: "1 minute" },
  "/generate-summary": { max: 10, timeWindow: "1 minute" },
  "/pipeline/run": { max: 5, timeWindow: "1 minute" },
};

function clientKey(request: FastifyRequest): string {
  return `ip:${request.ip}`;
}

export async function registerRateLimit(app: FastifyInstance, redis: Redis | null = null) {
  // Must run before the plugin's own onRoute hook reads the route config.
  app.addHook("onRoute", (routeOptions) => {
    const limits = ROUTE_LIMITS[routeOptions.url];
    if (limits && routeOptions.method === "POST") {
      routeOptions.config = {
        ...routeOptions.config,
        rateLimit: {
          max: limits.max,
          timeWindow: limits.timeWindow,
          keyGenerator: clientKey,
        },
      };
    }
  });

  await app.register(rateLimit, {
    global: true,
    max: 100,
    timeWindow: "1 minute",
    keyGenerator: clientKey,
    // Shared store when Valkey is configured, in-memory otherwise
    ...(redis ? { redis } : {}),
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      code: "RATE_LIMIT_EXCEEDED",
      message: "Too many requests, please try again later",
      retryAfter: Math.ceil(context.ttl / 1000),
    }),
  });
}
