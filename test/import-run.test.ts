import { test } from "node:test";
import assert from "node:assert/strict";
import { CredentialVault } from "../src/lib/vault";
import { BoundedErrorLog, summarizeRun } from "../src/core/import-run";
import { ExportAdapter } from "../src/providers/export-source";
import { countRows, createHarness, FakeAdapter, makeDetail, summaries } from "./helpers";

function timeoutError(): Error {
  const error = new Error("request timed out");
  error.name = "TimeoutError";
  return error;
}

test("one failing fetch leaves a partial run with the other conversation committed", async () => {
  const adapter = new FakeAdapter("openai", {
    list: summaries("a", "b"),
    details: { a: makeDetail("a", 3, 1), b: timeoutError() }
  });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });

  const jobId = h.controller.start(h.openai.id, key.id);
  assert.equal(h.status.get(jobId)?.status, "running");

  await h.queue.onIdle();

  const job = h.status.get(jobId);
  assert.ok(job);
  assert.equal(job.status, "partial");
  assert.equal(job.conversations_imported, 1);
  assert.equal(job.messages_imported, 3);
  assert.equal(job.artifacts_imported, 1);
  assert.equal(job.error_count, 1);
  assert.equal(job.error_details, "Error importing conversation b: request timed out");
  assert.equal(job.summary, "Imported 1 conversations, 3 messages, 1 artifacts; 1 failed");
  assert.ok(job.finished_at);

  assert.equal(countRows(h.db, "conversations"), 1);
  assert.equal(countRows(h.db, "messages"), 3);
  assert.equal(countRows(h.db, "artifacts"), 1);
  assert.equal(adapter.listCalls[0].credential, "test-key");
  assert.deepEqual(adapter.fetchCalls, ["a", "b"]);
  assert.ok(h.catalog.getApiKey(key.id)?.last_used_at);
});

test("a run where every conversation persists ends in success", async () => {
  const adapter = new FakeAdapter("openai", {
    list: summaries("c1", "c2", "c3"),
    details: { c1: makeDetail("c1", 2), c2: makeDetail("c2", 2), c3: makeDetail("c3", 2) }
  });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });

  const jobId = h.controller.start(h.openai.id, key.id);
  await h.queue.onIdle();

  const job = h.status.get(jobId);
  assert.ok(job);
  assert.equal(job.status, "success");
  assert.equal(job.conversations_imported, 3);
  assert.equal(job.messages_imported, 6);
  assert.equal(job.error_count, 0);
  assert.equal(job.error_details, null);
  assert.equal(job.summary, "Imported 3 conversations, 6 messages, 0 artifacts");
});

test("error details keep at most ten entries while every failure is counted", async () => {
  const ids = Array.from({ length: 15 }, (_, index) => `c${index}`);
  const details: Record<string, ReturnType<typeof makeDetail> | Error> = {};
  ids.forEach((id, index) => {
    details[id] = index < 3 ? makeDetail(id, 1) : new Error(`boom ${id}`);
  });
  const adapter = new FakeAdapter("openai", { list: summaries(...ids), details });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });

  const jobId = h.controller.start(h.openai.id, key.id);
  await h.queue.onIdle();

  const job = h.status.get(jobId);
  assert.ok(job);
  assert.equal(job.status, "partial");
  assert.equal(job.conversations_imported, 3);
  assert.equal(job.error_count, 12);
  const lines = (job.error_details ?? "").split("\n");
  assert.equal(lines.length, 10);
  assert.equal(lines[0], "Error importing conversation c3: boom c3");
  assert.equal(lines[9], "Error importing conversation c12: boom c12");
  assert.equal(job.summary, "Imported 3 conversations, 3 messages, 0 artifacts; 12 failed");
});

test("a listing failure fails the run without touching the credential", async () => {
  const adapter = new FakeAdapter("openai", { list: new Error("provider offline"), details: {} });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });

  const jobId = h.controller.start(h.openai.id, key.id);
  await h.queue.onIdle();

  const job = h.status.get(jobId);
  assert.ok(job);
  assert.equal(job.status, "failed");
  assert.equal(job.conversations_imported, 0);
  assert.equal(job.error_details, "Listing conversations failed: provider offline");
  assert.equal(job.summary, "Import failed: Listing conversations failed: provider offline");
  assert.equal(adapter.fetchCalls.length, 0);
  assert.equal(h.catalog.getApiKey(key.id)?.last_used_at, null);
});

test("re-running an import skips conversations that already exist", async () => {
  const adapter = new FakeAdapter("openai", {
    list: summaries("a", "b"),
    details: { a: makeDetail("a", 2), b: makeDetail("b", 1) }
  });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });

  h.controller.start(h.openai.id, key.id);
  await h.queue.onIdle();
  const secondId = h.controller.start(h.openai.id, key.id);
  await h.queue.onIdle();

  const second = h.status.get(secondId);
  assert.ok(second);
  assert.equal(second.status, "success");
  assert.equal(second.conversations_imported, 0);
  assert.equal(second.conversations_skipped, 2);
  assert.equal(second.summary, "Imported 0 conversations, 0 messages, 0 artifacts; skipped 2 already imported");
  assert.equal(countRows(h.db, "conversations"), 2);
  assert.equal(countRows(h.db, "messages"), 3);
});

test("an inactive credential fails the run before the adapter is called", async () => {
  const adapter = new FakeAdapter("openai", { list: summaries("a"), details: { a: makeDetail("a", 1) } });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });
  h.catalog.updateApiKey(key.id, { is_active: false });

  const jobId = h.controller.start(h.openai.id, key.id);
  await h.queue.onIdle();

  const job = h.status.get(jobId);
  assert.equal(job?.status, "failed");
  assert.equal(job?.error_details, "API key is not active");
  assert.equal(adapter.listCalls.length, 0);
  assert.equal(h.catalog.getApiKey(key.id)?.last_used_at, null);
});

test("a credential deleted before the run starts fails it as not found", async () => {
  const adapter = new FakeAdapter("openai", { list: summaries("a"), details: { a: makeDetail("a", 1) } });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });

  const jobId = h.controller.start(h.openai.id, key.id);
  h.catalog.deleteApiKey(key.id);
  await h.queue.onIdle();

  const job = h.status.get(jobId);
  assert.equal(job?.status, "failed");
  assert.equal(job?.api_key_id, null);
  assert.equal(job?.error_details, "API key not found");
});

test("a credential of another provider is rejected", async () => {
  const adapter = new FakeAdapter("openai", { list: summaries("a"), details: { a: makeDetail("a", 1) } });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.anthropic.id, label: "claude", api_key_value: "test-key" });

  const jobId = h.controller.start(h.openai.id, key.id);
  await h.queue.onIdle();

  assert.equal(h.status.get(jobId)?.error_details, "API key does not belong to the requested provider");
});

test("a provider without a registered adapter fails the run", async () => {
  const h = createHarness();
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });

  const jobId = h.controller.start(h.openai.id, key.id);
  await h.queue.onIdle();

  const job = h.status.get(jobId);
  assert.equal(job?.status, "failed");
  assert.equal(job?.error_details, "Unknown provider: openai");
  assert.equal(h.catalog.getApiKey(key.id)?.last_used_at, null);
});

test("a credential that cannot be decrypted fails the run", async () => {
  const adapter = new FakeAdapter("openai", { list: summaries("a"), details: { a: makeDetail("a", 1) } });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });
  const foreign = new CredentialVault("other-secret").encrypt("test-key");
  h.db.prepare("UPDATE api_keys SET key_encrypted = ? WHERE id = ?").run(foreign, key.id);

  const jobId = h.controller.start(h.openai.id, key.id);
  await h.queue.onIdle();

  const job = h.status.get(jobId);
  assert.equal(job?.status, "failed");
  assert.ok(job?.error_details?.startsWith("Failed to decrypt API key: "));
  assert.equal(adapter.listCalls.length, 0);
});

test("a conversation that fails to persist is rolled back and isolated", async () => {
  const broken = makeDetail("b", 2);
  broken.messages[1].sequence_index = 0;
  const adapter = new FakeAdapter("openai", {
    list: summaries("a", "b", "c"),
    details: { a: makeDetail("a", 1), b: broken, c: makeDetail("c", 1) }
  });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });

  const jobId = h.controller.start(h.openai.id, key.id);
  await h.queue.onIdle();

  const job = h.status.get(jobId);
  assert.ok(job);
  assert.equal(job.status, "partial");
  assert.equal(job.conversations_imported, 2);
  assert.ok(job.error_details?.startsWith("Error importing conversation b: "));
  assert.equal(countRows(h.db, "conversations"), 2);
  assert.equal(countRows(h.db, "messages"), 2);
});

test("the requested range is stored and handed to the adapter", async () => {
  const adapter = new FakeAdapter("openai", { list: [], details: {} });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });

  const jobId = h.controller.start(h.openai.id, key.id, {
    fromDate: new Date("2025-01-01T00:00:00Z"),
    toDate: new Date("2025-02-01T00:00:00Z")
  });
  await h.queue.onIdle();

  const job = h.status.get(jobId);
  assert.deepEqual(job?.requested_range, {
    from_date: "2025-01-01T00:00:00.000Z",
    to_date: "2025-02-01T00:00:00.000Z"
  });
  assert.equal(job?.status, "success");
  assert.equal(job?.summary, "Imported 0 conversations, 0 messages, 0 artifacts");
  assert.equal(adapter.listCalls[0].options.fromDate?.toISOString(), "2025-01-01T00:00:00.000Z");
  assert.equal(adapter.listCalls[0].options.toDate?.toISOString(), "2025-02-01T00:00:00.000Z");
});

test("artifacts returned by fetchArtifacts replace the detail's list", async () => {
  const adapter = new FakeAdapter("openai", {
    list: summaries("a"),
    details: { a: makeDetail("a", 2, 1) },
    artifacts: () => [
      { artifact_type: "image", filename: "chart.png", download_status: "success", message_sequence_index: 1 },
      { artifact_type: "code", download_status: "error", download_error: "expired link" }
    ]
  });
  const h = createHarness({ adapters: [adapter] });
  const key = h.catalog.createApiKey({ provider_id: h.openai.id, label: "main", api_key_value: "test-key" });

  const jobId = h.controller.start(h.openai.id, key.id);
  await h.queue.onIdle();

  assert.equal(h.status.get(jobId)?.artifacts_imported, 2);
  const rows = h.db
    .prepare<[], { artifact_type: string; download_status: string }>(
      "SELECT artifact_type, download_status FROM artifacts ORDER BY rowid"
    )
    .all();
  assert.deepEqual(rows, [
    { artifact_type: "image", download_status: "success" },
    { artifact_type: "code", download_status: "error" }
  ]);
});

test("export runs go through the same pipeline without a credential", async () => {
  const h = createHarness();
  const adapter = new ExportAdapter("openai", [makeDetail("x", 2), makeDetail("y", 1)]);

  const jobId = h.controller.startExport(h.openai.id, adapter);
  await h.queue.onIdle();

  const job = h.status.get(jobId);
  assert.ok(job);
  assert.equal(job.origin, "export");
  assert.equal(job.api_key_id, null);
  assert.equal(job.status, "success");
  assert.equal(job.conversations_imported, 2);
  const origins = h.db.prepare<[], { origin: string }>("SELECT DISTINCT origin FROM conversations").all();
  assert.deepEqual(origins, [{ origin: "export" }]);
});

test("concurrent runs for different credentials both finish", async () => {
  const adapter = new FakeAdapter("openai", {
    list: summaries("a", "b"),
    details: { a: makeDetail("a", 1), b: makeDetail("b", 1) }
  });
  const h = createHarness({ adapters: [adapter], concurrency: 2 });
  const first = h.catalog.createApiKey({ provider_id: h.openai.id, label: "one", api_key_value: "test-key-1" });
  const second = h.catalog.createApiKey({ provider_id: h.openai.id, label: "two", api_key_value: "test-key-2" });

  const firstJob = h.controller.start(h.openai.id, first.id);
  const secondJob = h.controller.start(h.openai.id, second.id);
  await h.queue.onIdle();

  const a = h.status.get(firstJob);
  const b = h.status.get(secondJob);
  assert.equal(a?.status, "success");
  assert.equal(b?.status, "success");
  assert.equal((a?.conversations_imported ?? 0) + (b?.conversations_imported ?? 0), 2);
  assert.equal((a?.conversations_skipped ?? 0) + (b?.conversations_skipped ?? 0), 2);
  assert.equal(countRows(h.db, "conversations"), 2);
});

test("BoundedErrorLog keeps the first entries and counts everything", () => {
  const log = new BoundedErrorLog(2);
  assert.equal(log.details(), null);
  log.record("one");
  log.record("two");
  log.record("three");
  assert.equal(log.total, 3);
  assert.equal(log.details(), "one\ntwo");
});

test("summarizeRun mentions skips and failures only when present", () => {
  assert.equal(
    summarizeRun({ conversations: 2, skipped: 0, messages: 5, artifacts: 1 }, 0),
    "Imported 2 conversations, 5 messages, 1 artifacts"
  );
  assert.equal(
    summarizeRun({ conversations: 1, skipped: 3, messages: 2, artifacts: 0 }, 4),
    "Imported 1 conversations, 2 messages, 0 artifacts; skipped 3 already imported; 4 failed"
  );
});
