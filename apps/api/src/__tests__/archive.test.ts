import { promises as fs } from "node:fs";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { PipelineResult } from "@callreplay/shared";
import { TranscriptArchive, fileSegment } from "../lib/archive.js";
import { bandraCall, makeTempDir, silenceConsole } from "./fixtures.js";

const emptyResult: PipelineResult = {
  pipeline_id: "pipeline_20261001_120000",
  timestamp: "2026-10-01T12:00:00.000Z",
  input_count: 0,
  analysis_results: [],
  fix_results: {},
  summary: { error: "No analysis results to summarize" },
  statistics: {
    total: 0,
    analyzed: 0,
    skipped: 0,
    errors: 0,
    issues_detected: 0,
    issue_rate: 0,
    average_confidence: 0,
    success_rate: 0,
    processing_efficiency: 0,
  },
};

describe("fileSegment", () => {
  it("replaces path separators and other unsafe characters", () => {
    expect(fileSegment("../etc/passwd")).toBe(".._etc_passwd");
    expect(fileSegment("call 42:a")).toBe("call_42_a");
    expect(fileSegment("call-42_b.v2")).toBe("call-42_b.v2");
  });
});

describe("TranscriptArchive", () => {
  let dir: string;
  let archive: TranscriptArchive;

  beforeEach(async () => {
    silenceConsole();
    dir = await makeTempDir();
    archive = new TranscriptArchive({ dataDir: dir });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes the transcript under its call id", async () => {
    expect(await archive.saveTranscript(bandraCall)).toBe(true);

    const saved = JSON.parse(await fs.readFile(join(dir, "transcript_bandra.json"), "utf8"));
    expect(saved).toEqual(bandraCall);
  });

  it("overwrites an earlier transcript with the same call id", async () => {
    await archive.saveTranscript(bandraCall);
    await archive.saveTranscript({ ...bandraCall, metadata: { status: "failed" } });

    const saved = JSON.parse(await fs.readFile(archive.transcriptPath("bandra"), "utf8"));
    expect(saved.metadata).toEqual({ status: "failed" });
  });

  it("returns false when the data directory is unusable", async () => {
    const blocked = join(dir, "blocked");
    await fs.writeFile(blocked, "", "utf8");
    const broken = new TranscriptArchive({ dataDir: blocked });

    expect(await broken.saveTranscript(bandraCall)).toBe(false);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("writes a pipeline result and returns its path", async () => {
    const path = await archive.savePipelineResult(emptyResult);

    expect(path).toBe(join(dir, "pipeline_pipeline_20261001_120000.json"));
    expect(JSON.parse(await fs.readFile(path, "utf8"))).toEqual(emptyResult);
  });

  it("throws when a pipeline result cannot be written", async () => {
    const blocked = join(dir, "blocked");
    await fs.writeFile(blocked, "", "utf8");
    const broken = new TranscriptArchive({ dataDir: blocked });

    await expect(broken.savePipelineResult(emptyResult)).rejects.toThrow();
  });
});
