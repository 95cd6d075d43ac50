import { test } from "node:test";
import assert from "node:assert/strict";
import { ConversationStore } from "../src/core/conversations";
import { NotFoundError, ValidationError } from "../src/lib/errors";
import { countRows, createHarness, makeDetail } from "./helpers";

function setup() {
  const h = createHarness();
  return { h, store: new ConversationStore(h.db, h.catalog, h.writer) };
}

test("get returns messages in sequence order with their artifacts", async () => {
  const { h, store } = setup();
  const detail = makeDetail("c1", 3, 1);
  detail.messages.reverse();
  const outcome = await h.writer.write(detail, { providerId: h.openai.id, importJobId: null, origin: "api" });

  const conversation = store.get(outcome.conversationId);
  assert.equal(conversation.title, "Conversation c1");
  assert.equal(conversation.archived, false);
  assert.deepEqual(
    conversation.messages.map((message) => message.content),
    ["message 0 of c1", "message 1 of c1", "message 2 of c1"]
  );
  assert.equal(conversation.artifacts.length, 1);
  assert.equal(conversation.artifacts[0].message_id, conversation.messages[0].id);
  assert.deepEqual(conversation.project_ids, []);
});

test("list reports message counts and artifact presence", async () => {
  const { h, store } = setup();
  const context = { providerId: h.openai.id, importJobId: null, origin: "api" as const };
  await h.writer.write(makeDetail("c1", 2, 1), context);
  await h.writer.write({ ...makeDetail("c2", 1), started_at: "2025-02-01T00:00:00.000Z" }, context);
  await h.writer.write(makeDetail("c3", 1), { ...context, providerId: h.anthropic.id });

  const all = store.list();
  assert.equal(all.length, 3);
  assert.equal(all[0].title, "Conversation c2");

  const openai = store.list({ providerId: h.openai.id });
  assert.deepEqual(
    openai.map((item) => [item.title, item.message_count, item.has_artifacts]),
    [
      ["Conversation c2", 1, false],
      ["Conversation c1", 2, true]
    ]
  );
});

test("deleting a conversation removes its messages and artifacts", async () => {
  const { h, store } = setup();
  const outcome = await h.writer.write(makeDetail("c1", 2, 1), {
    providerId: h.openai.id,
    importJobId: null,
    origin: "api"
  });

  store.delete(outcome.conversationId);
  assert.equal(countRows(h.db, "conversations"), 0);
  assert.equal(countRows(h.db, "messages"), 0);
  assert.equal(countRows(h.db, "artifacts"), 0);
  assert.throws(() => store.get(outcome.conversationId), NotFoundError);
  assert.throws(() => store.delete(outcome.conversationId), NotFoundError);
});

test("conversations can be filed into projects", async () => {
  const { h, store } = setup();
  const outcome = await h.writer.write(makeDetail("c1", 1), { providerId: h.openai.id, importJobId: null, origin: "api" });
  const project = h.catalog.createProject("research");

  store.assignProject(outcome.conversationId, project.id);
  store.assignProject(outcome.conversationId, project.id);
  assert.deepEqual(store.get(outcome.conversationId).project_ids, [project.id]);

  store.unassignProject(outcome.conversationId, project.id);
  assert.deepEqual(store.get(outcome.conversationId).project_ids, []);
  assert.throws(() => store.unassignProject(outcome.conversationId, project.id), NotFoundError);
  assert.throws(() => store.assignProject(outcome.conversationId, "missing"), NotFoundError);
  assert.throws(() => store.assignProject("missing", project.id), NotFoundError);
});

test("manual conversations are numbered in the order given", async () => {
  const { h, store } = setup();
  const conversation = await store.createManual(h.anthropic.id, {
    title: "Pasted chat",
    notes: "copied from the app",
    messages: [
      { role: "user", content: "first" },
      { role: "assistant", content: "second", metadata: { model: "test-model" } }
    ]
  });

  assert.equal(conversation.origin, "manual");
  assert.equal(conversation.provider_conversation_id, null);
  assert.equal(conversation.import_job_id, null);
  assert.equal(conversation.import_notes, "copied from the app");
  assert.deepEqual(
    conversation.messages.map((message) => [message.sequence_index, message.role, message.content]),
    [
      [0, "user", "first"],
      [1, "assistant", "second"]
    ]
  );
  assert.deepEqual(conversation.messages[1].raw_metadata, { model: "test-model" });
});

test("manual conversations need messages and a known provider", async () => {
  const { h, store } = setup();
  await assert.rejects(store.createManual(h.openai.id, { messages: [] }), ValidationError);
  await assert.rejects(store.createManual("missing", { messages: [{ role: "user", content: "hi" }] }), NotFoundError);
});

test("list names each conversation's projects and filters by project", async () => {
  const { h, store } = setup();
  const context = { providerId: h.openai.id, importJobId: null, origin: "api" as const };
  const first = await h.writer.write(makeDetail("c1", 1), context);
  const second = await h.writer.write(makeDetail("c2", 1), context);
  const travel = h.catalog.createProject("travel");
  const research = h.catalog.createProject("research");
  store.assignProject(first.conversationId, travel.id);
  store.assignProject(first.conversationId, research.id);
  store.assignProject(second.conversationId, research.id);

  const byId = new Map(store.list().map((item) => [item.id, item.projects]));
  assert.deepEqual(byId.get(first.conversationId), ["research", "travel"]);
  assert.deepEqual(byId.get(second.conversationId), ["research"]);

  assert.deepEqual(
    store.list({ projectId: travel.id }).map((item) => item.id),
    [first.conversationId]
  );
  assert.deepEqual(store.list({ providerId: h.anthropic.id, projectId: research.id }), []);
});
