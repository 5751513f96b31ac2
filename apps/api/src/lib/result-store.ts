import { promises as fs } from "node:fs";
import { dirname, join } from "node:path";
import {
  AnalysisRecordSchema,
  JsonDocumentSchema,
  STATS_PREVIEW_CALL_IDS,
  type AnalysisRecord,
  type HistoryQuery,
  type JsonDocument,
} from "@callreplay/shared";
import { errorMessage, isNotFound } from "./errors.js";
import { compactTimestamp } from "./time.js";

const RESULTS_FILE = "analyzed_calls.json";
const DAY_MS = 24 * 60 * 60 * 1000;

export interface ResultStoreOptions {
  dataDir: string;
  fileName?: string;
  /**
   * Chain appends on one promise owned by the store. Off by default: plain
   * appends are an unlocked read-modify-write and concurrent callers can
   * overwrite each other.
   */
  serializeAppends?: boolean;
  now?: () => Date;
}

export interface StoreStats {
  total: number;
  date_range: {
    earliest: string;
    latest: string;
    span_days: number;
  } | null;
  status_breakdown: Record<string, number>;
  unique_calls: number;
  call_ids: string[];
}

function timestampOf(doc: JsonDocument): string {
  return typeof doc.timestamp === "string" ? doc.timestamp : "";
}

function parseTime(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
}

function withTimestamp(record: AnalysisRecord, timestamp: string): AnalysisRecord {
  return { ...record, timestamp: record.timestamp ?? timestamp };
}

/**
 * Append-only collection of analysis records kept as one JSON array on disk.
 * Every write rereads and rewrites the whole file. Storage failures are
 * logged and reported as `false` or an empty result, never thrown.
 */
export class ResultStore {
  readonly filePath: string;
  private readonly dataDir: string;
  private readonly serializeAppends: boolean;
  private readonly now: () => Date;
  private appendChain: Promise<boolean> = Promise.resolve(true);

  constructor(options: ResultStoreOptions) {
    this.dataDir = options.dataDir;
    this.filePath = join(options.dataDir, options.fileName ?? RESULTS_FILE);
    this.serializeAppends = options.serializeAppends ?? false;
    this.now = options.now ?? (() => new Date());
  }

  /** Raw documents in file order. Missing or unreadable files read as empty. */
  async readAll(): Promise<JsonDocument[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (!isNotFound(err)) {
        console.error(`[store] failed to read ${this.filePath}: ${errorMessage(err)}`);
      }
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      console.error(`[store] ${this.filePath} is not valid JSON: ${errorMessage(err)}`);
      return [];
    }

    if (!Array.isArray(parsed)) {
      console.error(`[store] ${this.filePath} does not hold a JSON array`);
      return [];
    }

    const items: unknown[] = parsed;
    return items.flatMap((item) => {
      const doc = JsonDocumentSchema.safeParse(item);
      return doc.success ? [doc.data] : [];
    });
  }

  append(record: AnalysisRecord): Promise<boolean> {
    if (!this.serializeAppends) {
      return this.writeRecords([record], `analysis for call ${record.call_id}`);
    }
    const next = this.appendChain.then(() =>
      this.writeRecords([record], `analysis for call ${record.call_id}`),
    );
    this.appendChain = next;
    return next;
  }

  /** One read-modify-write for the whole list; absent timestamps share one value. */
  appendMany(records: readonly AnalysisRecord[]): Promise<boolean> {
    if (!this.serializeAppends) {
      return this.writeRecords(records, `${records.length} analysis records`);
    }
    const next = this.appendChain.then(() =>
      this.writeRecords(records, `${records.length} analysis records`),
    );
    this.appendChain = next;
    return next;
  }

  /**
   * Filters, then truncates to `limit` in file order, then sorts the
   * survivors newest first. A limited result is therefore not guaranteed to
   * be the newest N records when the file is not chronological.
   */
  async query(filters: HistoryQuery = {}): Promise<AnalysisRecord[]> {
    let rows = await this.readAll();

    if (filters.start_date || filters.end_date) {
      rows = this.filterByDateRange(rows, filters.start_date, filters.end_date);
    }
    if (filters.call_id) {
      rows = rows.filter((doc) => doc.call_id === filters.call_id);
    }
    if (filters.status) {
      rows = rows.filter((doc) => doc.status === filters.status);
    }
    if (filters.limit && filters.limit > 0) {
      rows = rows.slice(0, filters.limit);
    }

    const sorted = [...rows].sort((a, b) => {
      const ta = timestampOf(a);
      const tb = timestampOf(b);
      if (ta === tb) return 0;
      return ta < tb ? 1 : -1;
    });

    const records: AnalysisRecord[] = [];
    for (const doc of sorted) {
      const record = AnalysisRecordSchema.safeParse(doc);
      if (record.success) {
        records.push(record.data);
      } else {
        console.warn(`[store] skipping malformed record for call ${String(doc.call_id)}`);
      }
    }
    console.info(`[store] retrieved ${records.length} records`);
    return records;
  }

  async stats(): Promise<StoreStats> {
    const docs = await this.readAll();
    const statusBreakdown: Record<string, number> = {};
    const callIds: string[] = [];
    const seen = new Set<string>();
    let earliest: number | undefined;
    let latest: number | undefined;

    for (const doc of docs) {
      const status = typeof doc.status === "string" ? doc.status : "unknown";
      statusBreakdown[status] = (statusBreakdown[status] ?? 0) + 1;

      if (typeof doc.call_id === "string" && doc.call_id && !seen.has(doc.call_id)) {
        seen.add(doc.call_id);
        callIds.push(doc.call_id);
      }

      const ms = parseTime(timestampOf(doc));
      if (ms === undefined) continue;
      earliest = earliest === undefined ? ms : Math.min(earliest, ms);
      latest = latest === undefined ? ms : Math.max(latest, ms);
    }

    return {
      total: docs.length,
      date_range:
        earliest !== undefined && latest !== undefined
          ? {
              earliest: new Date(earliest).toISOString(),
              latest: new Date(latest).toISOString(),
              span_days: Math.floor((latest - earliest) / DAY_MS),
            }
          : null,
      status_breakdown: statusBreakdown,
      unique_calls: seen.size,
      call_ids: callIds.slice(0, STATS_PREVIEW_CALL_IDS),
    };
  }

  /** Removes the results file. Succeeds when there was nothing to remove. */
  async clear(): Promise<boolean> {
    try {
      await fs.rm(this.filePath, { force: true });
      console.info("[store] cleared all analysis data");
      return true;
    } catch (err) {
      console.error(`[store] failed to clear analysis data: ${errorMessage(err)}`);
      return false;
    }
  }

  async backup(path?: string): Promise<boolean> {
    const target =
      path ?? join(this.dataDir, `analyzed_calls_backup_${compactTimestamp(this.now())}.json`);
    try {
      await fs.mkdir(dirname(target), { recursive: true });
      await fs.copyFile(this.filePath, target);
      console.info(`[store] backup created at ${target}`);
      return true;
    } catch (err) {
      if (isNotFound(err)) {
        console.warn("[store] no analysis data to back up");
      } else {
        console.error(`[store] backup to ${target} failed: ${errorMessage(err)}`);
      }
      return false;
    }
  }

  private async writeRecords(records: readonly AnalysisRecord[], label: string): Promise<boolean> {
    const stamp = this.now().toISOString();
    try {
      const docs = await this.readAll();
      for (const record of records) {
        docs.push(withTimestamp(record, stamp));
      }
      await fs.mkdir(this.dataDir, { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(docs, null, 2), "utf8");
      console.info(`[store] saved ${label}`);
      return true;
    } catch (err) {
      console.error(`[store] failed to save ${label}: ${errorMessage(err)}`);
      return false;
    }
  }

  private filterByDateRange(docs: JsonDocument[], start?: string, end?: string): JsonDocument[] {
    const startMs = parseTime(start);
    const endMs = parseTime(end);
    return docs.filter((doc) => {
      const ms = parseTime(timestampOf(doc));
      if (ms === undefined) return false;
      if (startMs !== undefined && ms < startMs) return false;
      if (endMs !== undefined && ms > endMs) return false;
      return true;
    });
  }
}
