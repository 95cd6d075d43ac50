import { Db } from "../db/database";
import { errorMessage } from "../lib/errors";
import { Logger } from "../lib/logger";
import { CredentialVault } from "../lib/vault";
import {
  ConversationProviderAdapter,
  ListOptions,
  ProviderArtifact,
  ProviderConversationDetail,
  ProviderConversationSummary
} from "../providers/adapter";
import { ProviderRegistry } from "../providers/registry";
import { ImportJobRecord, JobOrigin, RequestedRange } from "../types/schema";
import { Catalog } from "./catalog";
import { JobRunLedger, JobStatusStore, RunProgress } from "./job-status";
import { PersistenceWriter } from "./persist";
import { RunQueue } from "./run-queue";

export const MAX_RECORDED_ERRORS = 10;

export interface DateRange {
  fromDate?: Date;
  toDate?: Date;
}

export interface ImportControllerDeps {
  db: Db;
  catalog: Catalog;
  vault: CredentialVault;
  registry: ProviderRegistry;
  writer: PersistenceWriter;
  queue: RunQueue;
  logger: Logger;
  now?: () => Date;
}

type RunDescriptor =
  | { kind: "api"; jobId: string }
  | { kind: "export"; jobId: string; adapter: ConversationProviderAdapter };

interface RunSource {
  adapter: ConversationProviderAdapter;
  credential: string;
  apiKeyId: string | null;
  origin: JobOrigin;
}

type SourceResolution = { ok: true; source: RunSource } | { ok: false; reason: string };

interface Tally {
  conversations: number;
  skipped: number;
  messages: number;
  artifacts: number;
}

/** Keeps the first `limit` messages and counts the rest. */
export class BoundedErrorLog {
  private readonly entries: string[] = [];
  private count = 0;

  constructor(private readonly limit: number) {}

  record(message: string): void {
    this.count += 1;
    if (this.entries.length < this.limit) this.entries.push(message);
  }

  get total(): number {
    return this.count;
  }

  details(): string | null {
    return this.entries.length ? this.entries.join("\n") : null;
  }
}

export function toRequestedRange(range: DateRange): RequestedRange | null {
  const out: RequestedRange = {};
  if (range.fromDate) out.from_date = range.fromDate.toISOString();
  if (range.toDate) out.to_date = range.toDate.toISOString();
  return out.from_date || out.to_date ? out : null;
}

export function toListOptions(range: RequestedRange | null): ListOptions {
  const options: ListOptions = {};
  if (range?.from_date) options.fromDate = new Date(range.from_date);
  if (range?.to_date) options.toDate = new Date(range.to_date);
  return options;
}

export function summarizeRun(tally: Tally, errorTotal: number): string {
  const parts = [`Imported ${tally.conversations} conversations, ${tally.messages} messages, ${tally.artifacts} artifacts`];
  if (tally.skipped > 0) parts.push(`skipped ${tally.skipped} already imported`);
  if (errorTotal > 0) parts.push(`${errorTotal} failed`);
  return parts.join("; ");
}

/**
 * Drives a job run from listing through persistence. `start` records a running job and hands
 * the body to the queue; the run then ends in exactly one terminal state.
 */
export class ImportController {
  private readonly ledger: JobRunLedger;
  private readonly status: JobStatusStore;
  private readonly now: () => Date;

  constructor(private readonly deps: ImportControllerDeps) {
    this.ledger = new JobRunLedger(deps.db);
    this.status = new JobStatusStore(deps.db);
    this.now = deps.now ?? (() => new Date());
  }

  start(providerId: string, credentialId: string, range: DateRange = {}): string {
    const jobId = this.ledger.create({
      providerId,
      apiKeyId: credentialId,
      origin: "api",
      requestedRange: toRequestedRange(range),
      startedAt: this.now().toISOString()
    });
    this.enqueue({ kind: "api", jobId });
    return jobId;
  }

  /** Runs an export-backed adapter through the same pipeline; no credential is involved. */
  startExport(providerId: string, adapter: ConversationProviderAdapter, range: DateRange = {}): string {
    const jobId = this.ledger.create({
      providerId,
      apiKeyId: null,
      origin: "export",
      requestedRange: toRequestedRange(range),
      startedAt: this.now().toISOString()
    });
    this.enqueue({ kind: "export", jobId, adapter });
    return jobId;
  }

  private enqueue(descriptor: RunDescriptor): void {
    this.deps.queue.enqueue(`import:${descriptor.jobId}`, () => this.execute(descriptor));
  }

  private async execute(descriptor: RunDescriptor): Promise<void> {
    const job = this.status.get(descriptor.jobId);
    if (!job) {
      this.deps.logger.warn({ jobId: descriptor.jobId }, "import.run.missing_job");
      return;
    }

    const log = this.deps.logger.child({ jobId: job.id, providerId: job.provider_id, origin: job.origin });
    log.info("import.run.started");

    try {
      const resolved =
        descriptor.kind === "api" ? this.resolveApiSource(job) : this.resolveExportSource(job, descriptor.adapter);
      if (!resolved.ok) {
        this.failRun(job.id, resolved.reason, log);
        return;
      }
      await this.importAll(job, resolved.source, log);
    } catch (error) {
      this.failRun(job.id, `Unexpected error: ${errorMessage(error)}`, log);
    }
  }

  private resolveApiSource(job: ImportJobRecord): SourceResolution {
    const { catalog, vault, registry } = this.deps;

    const apiKey = job.api_key_id ? catalog.getStoredApiKey(job.api_key_id) : undefined;
    if (!apiKey) return { ok: false, reason: "API key not found" };
    if (apiKey.provider_id !== job.provider_id) {
      return { ok: false, reason: "API key does not belong to the requested provider" };
    }
    if (!apiKey.is_active) return { ok: false, reason: "API key is not active" };

    const provider = catalog.getProvider(job.provider_id);
    if (!provider) return { ok: false, reason: "Provider not found" };

    let credential: string;
    try {
      credential = vault.decrypt(apiKey.key_encrypted);
    } catch (error) {
      return { ok: false, reason: `Failed to decrypt API key: ${errorMessage(error)}` };
    }

    const lookup = registry.lookup(provider.name);
    if (!lookup.found) {
      return { ok: false, reason: `Unknown provider: ${lookup.providerName}` };
    }

    return { ok: true, source: { adapter: lookup.adapter, credential, apiKeyId: apiKey.id, origin: "api" } };
  }

  private resolveExportSource(job: ImportJobRecord, adapter: ConversationProviderAdapter): SourceResolution {
    const provider = this.deps.catalog.getProvider(job.provider_id);
    if (!provider) return { ok: false, reason: "Provider not found" };
    return { ok: true, source: { adapter, credential: "", apiKeyId: null, origin: "export" } };
  }

  private async importAll(job: ImportJobRecord, source: RunSource, log: Logger): Promise<void> {
    const { adapter, credential } = source;

    let summaries: ProviderConversationSummary[];
    try {
      summaries = await adapter.listConversations(credential, toListOptions(job.requested_range));
    } catch (error) {
      this.failRun(job.id, `Listing conversations failed: ${errorMessage(error)}`, log);
      return;
    }

    const tally: Tally = { conversations: 0, skipped: 0, messages: 0, artifacts: 0 };
    const errors = new BoundedErrorLog(MAX_RECORDED_ERRORS);

    for (const summary of summaries) {
      const providerConversationId = summary.provider_conversation_id;
      try {
        const detail = await adapter.fetchConversation(credential, providerConversationId);
        const artifacts = await this.collectArtifacts(adapter, credential, detail);
        const outcome = await this.deps.writer.write(
          { ...detail, artifacts },
          { providerId: job.provider_id, importJobId: job.id, origin: source.origin }
        );
        if (outcome.status === "skipped") {
          tally.skipped += 1;
        } else {
          tally.conversations += outcome.counts.conversations;
          tally.messages += outcome.counts.messages;
          tally.artifacts += outcome.counts.artifacts;
        }
      } catch (error) {
        const message = errorMessage(error);
        errors.record(`Error importing conversation ${providerConversationId}: ${message}`);
        log.warn({ conversation: providerConversationId, err: message }, "import.run.item_failed");
      }
      this.ledger.recordProgress(job.id, this.progressOf(tally, errors));
    }

    const finishedAt = this.now().toISOString();
    const outcome = {
      ...this.progressOf(tally, errors),
      status: errors.total === 0 ? ("success" as const) : ("partial" as const),
      summary: summarizeRun(tally, errors.total),
      finishedAt
    };

    const finalize = this.deps.db.transaction(() => {
      if (source.apiKeyId) this.deps.catalog.touchApiKey(source.apiKeyId, finishedAt);
      this.ledger.finish(job.id, outcome);
    });
    finalize();

    log.info(
      {
        status: outcome.status,
        conversations: tally.conversations,
        skipped: tally.skipped,
        errors: errors.total
      },
      "import.run.finished"
    );
  }

  private async collectArtifacts(
    adapter: ConversationProviderAdapter,
    credential: string,
    detail: ProviderConversationDetail
  ): Promise<ProviderArtifact[]> {
    const fetched = await adapter.fetchArtifacts(credential, detail);
    return fetched.length > 0 ? fetched : detail.artifacts;
  }

  private progressOf(tally: Tally, errors: BoundedErrorLog): RunProgress {
    return {
      ...tally,
      errorCount: errors.total,
      errorDetails: errors.details()
    };
  }

  private failRun(jobId: string, reason: string, log: Logger): void {
    this.ledger.fail(jobId, reason, this.now().toISOString());
    log.error({ reason }, "import.run.failed");
  }
}
