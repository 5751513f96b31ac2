import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";
import { FailureDetector, LLMInvoker, type CompletionRequest } from "@callreplay/analysis-core";
import type { Transcript } from "@callreplay/shared";
import { CallAnalyzer } from "../lib/analyzer.js";
import { TranscriptArchive } from "../lib/archive.js";
import { PipelineOrchestrator } from "../lib/pipeline.js";
import { ResultStore } from "../lib/result-store.js";
import type { TaskHandle, TaskOutcome, TaskQueue } from "../lib/worker-pool.js";
import { WorkerPool } from "../lib/worker-pool.js";

export const FIXED_NOW = new Date("2026-10-01T12:00:00.000Z");

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), "callreplay-"));
}

export function silenceConsole() {
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
}

/** Three turns ending in a frustrated question; the prefilter flags it. */
export const bandraCall: Transcript = {
  call_id: "bandra",
  dialog: [
    { speaker: "user", text: "Do you deliver to Bandra?" },
    { speaker: "bot", text: "We are open 11 to 10." },
    { speaker: "user", text: "That's not what I asked!" },
  ],
};

/** A clean order the prefilter lets through. */
export const pizzaCall: Transcript = {
  call_id: "pizza",
  dialog: [
    { speaker: "user", text: "Hi, I'd like to order a pizza" },
    { speaker: "bot", text: "Great! What size would you like?" },
    { speaker: "user", text: "Large please" },
    { speaker: "bot", text: "Perfect! Your large pizza will be ready in 25 minutes." },
    { speaker: "user", text: "Thank you!" },
  ],
};

/** Too short to judge; flagged by the short-call rule. */
export function shortCall(callId: string, text = "Hello?"): Transcript {
  return {
    call_id: callId,
    dialog: [
      { speaker: "user", text },
      { speaker: "bot", text: "Thanks for calling." },
    ],
  };
}

export function analysisReply(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    intent: "Check delivery area",
    bot_response_summary: "Bot answered with opening hours",
    issue_detected: true,
    issue_reason: "Intent misrecognized",
    suggested_fix: "Add a delivery-area intent",
    confidence_score: 0.9,
    ...overrides,
  });
}

export const FIX_REPLY = JSON.stringify({
  prompt_improvements: [],
  logic_improvements: [],
  training_suggestions: [],
  priority: "high",
  estimated_impact: "Fewer misrouted delivery questions",
});

export const SUMMARY_REPLY = JSON.stringify({
  common_issues: [{ issue: "Intent misrecognized", frequency: 1, impact: "high" }],
  overall_quality_score: 0.4,
});

export type PromptKind = "analysis" | "fixes" | "summary";

export function promptKind(request: CompletionRequest): PromptKind {
  if (request.prompt.includes("GENERATE SPECIFIC FIXES")) return "fixes";
  if (request.prompt.includes("SUMMARIZE THESE CALL ANALYSES")) return "summary";
  return "analysis";
}

/** Generator that answers each prompt kind with a fixed valid reply. */
export function scriptedGenerate() {
  return vi.fn(async (request: CompletionRequest) => {
    switch (promptKind(request)) {
      case "fixes":
        return FIX_REPLY;
      case "summary":
        return SUMMARY_REPLY;
      case "analysis":
        return analysisReply();
    }
  });
}

/** Runs each task immediately and hands back its handle. */
export class InlineQueue implements TaskQueue {
  readonly handles: TaskHandle[] = [];

  enqueue(name: string, task: () => Promise<unknown>): TaskHandle {
    const done = task().then(
      (): TaskOutcome => ({ status: "completed" }),
      (err: unknown): TaskOutcome => ({
        status: "failed",
        error: err instanceof Error ? err.message : String(err),
      }),
    );
    const handle = { id: `inline_${this.handles.length + 1}`, name, done };
    this.handles.push(handle);
    return handle;
  }
}

export interface HarnessOptions {
  dataDir: string;
  generate: (request: CompletionRequest) => Promise<string>;
  maxAttempts?: number;
  background?: TaskQueue;
}

export function createHarness(options: HarnessOptions) {
  const detector = new FailureDetector();
  const invoker = new LLMInvoker({
    generate: options.generate,
    maxAttempts: options.maxAttempts ?? 1,
  });
  const store = new ResultStore({ dataDir: options.dataDir, now: () => FIXED_NOW });
  const archive = new TranscriptArchive({ dataDir: options.dataDir });
  const pool = new WorkerPool({ concurrency: 2 });
  const analyzer = new CallAnalyzer({ detector, invoker, store });
  const background = options.background ?? new InlineQueue();
  const orchestrator = new PipelineOrchestrator({
    analyzer,
    archive,
    pool,
    background,
    now: () => FIXED_NOW,
  });
  return { detector, invoker, store, archive, pool, analyzer, orchestrator, background };
}
