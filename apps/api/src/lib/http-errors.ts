import type { FastifyReply } from "fastify";
import type { z } from "zod";

type FieldError = {
  path: string;
  message: string;
  code: string;
};

type ApiErrorResponse = {
  code: string;
  message: string;
  fieldErrors?: FieldError[];
};

export function normalizePath(path: ReadonlyArray<PropertyKey>): string {
  if (path.length === 0) return "root";
  return path
    .map((segment) => {
      if (typeof segment === "number") return `[${segment}]`;
      if (typeof segment === "symbol") return String(segment);
      return segment;
    })
    .join(".");
}

export function sendValidationError(reply: FastifyReply, error: z.ZodError) {
  const fieldErrors: FieldError[] = error.issues.map((issue) => ({
    path: normalizePath(issue.path),
    message: issue.message,
    code: issue.code,
  }));

  return reply.status(400).send({
    code: "VALIDATION_ERROR",
    message: "Invalid request payload",
    fieldErrors,
  } satisfies ApiErrorResponse);
}

/** The model could not produce a usable reply within its attempt budget. */
export function sendLlmError(reply: FastifyReply, message: string) {
  return reply.status(502).send({
    code: "LLM_ERROR",
    message,
  } satisfies ApiErrorResponse);
}

export function sendPipelineError(reply: FastifyReply, message: string, pipelineId: string) {
  return reply.status(500).send({
    code: "PIPELINE_FAILED",
    message,
    pipeline_id: pipelineId,
  } satisfies ApiErrorResponse & { pipeline_id: string });
}

export function sendStorageError(reply: FastifyReply, message: string) {
  return reply.status(500).send({
    code: "STORAGE_ERROR",
    message,
  } satisfies ApiErrorResponse);
}
