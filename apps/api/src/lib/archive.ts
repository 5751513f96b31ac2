import { promises as fs } from "node:fs";
import { join } from "node:path";
import type { PipelineResult, Transcript } from "@callreplay/shared";
import { errorMessage } from "./errors.js";

export interface TranscriptArchiveOptions {
  dataDir: string;
}

/** Reduce an opaque call id to something safe inside a file name. */
export function fileSegment(id: string): string {
  return id.replace(/[^A-Za-z0-9._-]/g, "_");
}

/**
 * Raw transcripts and pipeline results, one JSON file each under the data
 * directory. A transcript saved again under the same call id replaces the
 * earlier file.
 */
export class TranscriptArchive {
  private readonly dataDir: string;

  constructor(options: TranscriptArchiveOptions) {
    this.dataDir = options.dataDir;
  }

  transcriptPath(callId: string): string {
    return join(this.dataDir, `transcript_${fileSegment(callId)}.json`);
  }

  pipelinePath(pipelineId: string): string {
    return join(this.dataDir, `pipeline_${fileSegment(pipelineId)}.json`);
  }

  async saveTranscript(transcript: Transcript): Promise<boolean> {
    const path = this.transcriptPath(transcript.call_id);
    try {
      await this.writeJson(path, transcript);
      console.info(`[archive] stored transcript for call ${transcript.call_id}`);
      return true;
    } catch (err) {
      console.error(
        `[archive] failed to store transcript for call ${transcript.call_id}: ${errorMessage(err)}`,
      );
      return false;
    }
  }

  /** Writes the pipeline result and returns its path. Throws on I/O failure. */
  async savePipelineResult(result: PipelineResult): Promise<string> {
    const path = this.pipelinePath(result.pipeline_id);
    await this.writeJson(path, result);
    console.info(`[archive] stored pipeline result at ${path}`);
    return path;
  }

  private async writeJson(path: string, value: unknown): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    await fs.writeFile(path, JSON.stringify(value, null, 2), "utf8");
  }
}
