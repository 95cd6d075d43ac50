import { randomUUID } from "node:crypto";
import { Db, parseJsonObject } from "../db/database";
import { ImportJobRecord, JobOrigin, JobStatus, RequestedRange } from "../types/schema";

interface ImportJobRow extends Omit<ImportJobRecord, "requested_range"> {
  requested_range: string | null;
}

function toRange(value: string | null): RequestedRange | null {
  const parsed = parseJsonObject(value);
  if (!parsed) return null;
  const range: RequestedRange = {};
  if (typeof parsed.from_date === "string") range.from_date = parsed.from_date;
  if (typeof parsed.to_date === "string") range.to_date = parsed.to_date;
  return range;
}

function toRecord(row: ImportJobRow): ImportJobRecord {
  return { ...row, requested_range: toRange(row.requested_range) };
}

/** Read side of the job runs table. Always reflects the last committed state. */
export class JobStatusStore {
  constructor(private readonly db: Db) {}

  get(id: string): ImportJobRecord | undefined {
    const row = this.db.prepare<[string], ImportJobRow>("SELECT * FROM import_jobs WHERE id = ?").get(id);
    return row ? toRecord(row) : undefined;
  }

  list(providerId?: string): ImportJobRecord[] {
    const rows = providerId
      ? this.db
          .prepare<[string], ImportJobRow>(
            "SELECT * FROM import_jobs WHERE provider_id = ? ORDER BY started_at DESC, rowid DESC"
          )
          .all(providerId)
      : this.db.prepare<[], ImportJobRow>("SELECT * FROM import_jobs ORDER BY started_at DESC, rowid DESC").all();
    return rows.map(toRecord);
  }
}

export interface NewJobRun {
  providerId: string;
  apiKeyId: string | null;
  origin: JobOrigin;
  requestedRange: RequestedRange | null;
  startedAt: string;
}

export interface RunProgress {
  conversations: number;
  skipped: number;
  messages: number;
  artifacts: number;
  errorCount: number;
  errorDetails: string | null;
}

export interface RunOutcome extends RunProgress {
  status: Exclude<JobStatus, "running">;
  summary: string;
  finishedAt: string;
}

/**
 * Write side of the job runs table. Only the import controller holds one; every update is
 * guarded on `finished_at IS NULL` so a terminal run is never reopened.
 */
export class JobRunLedger {
  constructor(private readonly db: Db) {}

  create(input: NewJobRun): string {
    const id = randomUUID();
    const hasRange = input.requestedRange && Object.keys(input.requestedRange).length > 0;
    this.db
      .prepare(
        `INSERT INTO import_jobs (id, provider_id, api_key_id, origin, started_at, status, requested_range)
         VALUES (?, ?, ?, ?, ?, 'running', ?)`
      )
      .run(
        id,
        input.providerId,
        input.apiKeyId,
        input.origin,
        input.startedAt,
        hasRange ? JSON.stringify(input.requestedRange) : null
      );
    return id;
  }

  recordProgress(id: string, progress: RunProgress): void {
    this.db
      .prepare(
        `UPDATE import_jobs
            SET conversations_imported = @conversations,
                conversations_skipped = @skipped,
                messages_imported = @messages,
                artifacts_imported = @artifacts,
                error_count = @errorCount,
                error_details = @errorDetails
          WHERE id = @id AND finished_at IS NULL`
      )
      .run({ id, ...progress });
  }

  finish(id: string, outcome: RunOutcome): boolean {
    const result = this.db
      .prepare(
        `UPDATE import_jobs
            SET status = @status,
                summary = @summary,
                finished_at = @finishedAt,
                conversations_imported = @conversations,
                conversations_skipped = @skipped,
                messages_imported = @messages,
                artifacts_imported = @artifacts,
                error_count = @errorCount,
                error_details = @errorDetails
          WHERE id = @id AND finished_at IS NULL`
      )
      .run({ id, ...outcome });
    return result.changes > 0;
  }

  fail(id: string, reason: string, finishedAt: string): boolean {
    return this.finish(id, {
      status: "failed",
      summary: `Import failed: ${reason}`,
      finishedAt,
      conversations: 0,
      skipped: 0,
      messages: 0,
      artifacts: 0,
      errorCount: 1,
      errorDetails: reason
    });
  }
}
