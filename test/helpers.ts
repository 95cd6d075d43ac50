import { Catalog } from "../src/core/catalog";
import { ImportController } from "../src/core/import-run";
import { JobStatusStore } from "../src/core/job-status";
import { PersistenceWriter } from "../src/core/persist";
import { RunQueue } from "../src/core/run-queue";
import { BlobStore } from "../src/core/blobs";
import { Db, openDatabase } from "../src/db/database";
import { silentLogger } from "../src/lib/logger";
import { CredentialVault } from "../src/lib/vault";
import {
  ConversationProviderAdapter,
  ListOptions,
  ProviderArtifact,
  ProviderConversationDetail,
  ProviderConversationSummary
} from "../src/providers/adapter";
import { ProviderRegistry } from "../src/providers/registry";
import { ProviderRecord } from "../src/types/schema";

export const TEST_SECRET = "test-secret";

export interface Harness {
  db: Db;
  vault: CredentialVault;
  catalog: Catalog;
  registry: ProviderRegistry;
  writer: PersistenceWriter;
  queue: RunQueue;
  controller: ImportController;
  status: JobStatusStore;
  openai: ProviderRecord;
  anthropic: ProviderRecord;
}

export function providerByName(catalog: Catalog, name: string): ProviderRecord {
  const provider = catalog.getProviderByName(name);
  if (!provider) throw new Error(`seed provider ${name} missing`);
  return provider;
}

export function createHarness(
  options: { adapters?: ConversationProviderAdapter[]; concurrency?: number; blobs?: BlobStore } = {}
): Harness {
  const db = openDatabase();
  const logger = silentLogger();
  const vault = new CredentialVault(TEST_SECRET);
  const catalog = new Catalog(db, vault);
  const registry = new ProviderRegistry(options.adapters ?? []);
  const writer = new PersistenceWriter(db, options.blobs);
  const queue = new RunQueue({ concurrency: options.concurrency ?? 2, logger });
  const controller = new ImportController({ db, catalog, vault, registry, writer, queue, logger });
  return {
    db,
    vault,
    catalog,
    registry,
    writer,
    queue,
    controller,
    status: new JobStatusStore(db),
    openai: providerByName(catalog, "openai"),
    anthropic: providerByName(catalog, "anthropic")
  };
}

export function makeDetail(id: string, messageCount: number, artifactCount = 0): ProviderConversationDetail {
  return {
    provider_conversation_id: id,
    title: `Conversation ${id}`,
    started_at: "2025-01-10T09:00:00.000Z",
    messages: Array.from({ length: messageCount }, (_, index) => ({
      provider_message_id: `${id}-m${index}`,
      role: index % 2 === 0 ? "user" : "assistant",
      content: `message ${index} of ${id}`,
      sequence_index: index
    })),
    artifacts: Array.from({ length: artifactCount }, (_, index) => ({
      provider_artifact_id: `${id}-a${index}`,
      artifact_type: "file",
      filename: `attachment-${index}.txt`,
      download_status: "not_supported" as const,
      message_sequence_index: 0
    }))
  };
}

export interface FakeScript {
  list: ProviderConversationSummary[] | Error;
  details: Record<string, ProviderConversationDetail | Error>;
  artifacts?: (detail: ProviderConversationDetail) => ProviderArtifact[];
}

/** Scripted adapter; records the calls it receives. */
export class FakeAdapter implements ConversationProviderAdapter {
  readonly listCalls: Array<{ credential: string; options: ListOptions }> = [];
  readonly fetchCalls: string[] = [];

  constructor(
    readonly providerName: string,
    private readonly script: FakeScript
  ) {}

  async listConversations(credential: string, options: ListOptions): Promise<ProviderConversationSummary[]> {
    this.listCalls.push({ credential, options });
    if (this.script.list instanceof Error) throw this.script.list;
    return this.script.list;
  }

  async fetchConversation(_credential: string, providerConversationId: string): Promise<ProviderConversationDetail> {
    this.fetchCalls.push(providerConversationId);
    const detail = this.script.details[providerConversationId];
    if (!detail) throw new Error(`no scripted detail for ${providerConversationId}`);
    if (detail instanceof Error) throw detail;
    return detail;
  }

  async fetchArtifacts(_credential: string, detail: ProviderConversationDetail): Promise<ProviderArtifact[]> {
    return this.script.artifacts ? this.script.artifacts(detail) : [];
  }
}

export function summaries(...ids: string[]): ProviderConversationSummary[] {
  return ids.map((id) => ({ provider_conversation_id: id }));
}

export function countRows(db: Db, table: "conversations" | "messages" | "artifacts" | "import_jobs"): number {
  const row = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get();
  return row ? row.n : 0;
}
