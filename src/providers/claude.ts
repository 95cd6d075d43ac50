import { sha256 } from "../lib/hash";
import { ProviderConversationDetail } from "./adapter";
import {
  artifactTypeFor,
  ExportFiles,
  ExportParseResult,
  getArray,
  getObject,
  getString,
  isRecord,
  JsonDoc,
  loadJsonDocuments,
  MessageDraft,
  sequenceDrafts,
  textFromUnknown,
  toIsoOrUndefined
} from "./common";

type Row = Record<string, unknown>;

const ROLE_ALIASES: Record<string, string> = { human: "user", ai: "assistant" };

function conversationIdOf(conv: Row): string {
  return String(conv.uuid || conv.id || conv.conversation_id || conv.thread_id || "").trim();
}

function messageConversationId(msg: Row): string {
  return String(
    msg.conversation_uuid || msg.conversation_id || msg.conversationId || msg.thread_id || msg.chat_id || ""
  ).trim();
}

function messageRole(msg: Row): string {
  const author = getObject(msg.author);
  const role = String(msg.role || msg.sender || author?.role || author?.type || msg.from || "unknown");
  return ROLE_ALIASES[role.toLowerCase()] ?? role;
}

function messageText(msg: Row): string {
  const content = msg.content;
  if (Array.isArray(content)) {
    const lines = content
      .map((block) => {
        const obj = getObject(block);
        if (!obj) return "";
        if (typeof obj.text === "string") return obj.text;
        if (obj.type === "text" && typeof obj.value === "string") return obj.value;
        return "";
      })
      .filter(Boolean);
    if (lines.length) return lines.join("\n");
  }
  return textFromUnknown(msg.text ?? msg.content ?? msg.body ?? msg.message);
}

function messagesOf(conv: Row): Row[] {
  for (const key of ["chat_messages", "messages", "entries", "turns"]) {
    const arr = getArray(conv[key]);
    if (arr.length) return arr.map((item) => getObject(item)).filter(isRecord);
  }
  return [];
}

function looksLikeMessage(row: Row): boolean {
  return Boolean(messageConversationId(row) || row.role || row.sender || getObject(row.author)?.role);
}

function looksLikeConversation(row: Row): boolean {
  if (!conversationIdOf(row) || looksLikeMessage(row)) return false;
  return (
    messagesOf(row).length > 0 ||
    typeof row.name === "string" ||
    typeof row.title === "string" ||
    row.created_at !== undefined
  );
}

function conversationsFromDoc(value: unknown): Row[] {
  if (Array.isArray(value)) {
    return value.map((item) => getObject(item)).filter(isRecord).filter(looksLikeConversation);
  }
  const obj = getObject(value);
  if (!obj) return [];
  for (const key of ["conversations", "threads", "chats", "data"]) {
    const candidates = getArray(obj[key]).map((item) => getObject(item)).filter(isRecord).filter(looksLikeConversation);
    if (candidates.length) return candidates;
  }
  return [];
}

function flatMessagesFromDoc(value: unknown): Row[] {
  const fromArray = (rows: unknown[]): Row[] =>
    rows
      .map((item) => getObject(item))
      .filter(isRecord)
      .filter((msg) => messageConversationId(msg).length > 0);

  if (Array.isArray(value)) return fromArray(value);
  const obj = getObject(value);
  if (!obj) return [];
  for (const key of ["messages", "items", "data", "entries"]) {
    const parsed = fromArray(getArray(obj[key]));
    if (parsed.length) return parsed;
  }
  return [];
}

async function artifactsOf(msg: Row, files: ExportFiles): Promise<MessageDraft["artifacts"]> {
  const out: MessageDraft["artifacts"] = [];
  const sources: Row[] = [
    ...getArray(msg.attachments).map((item) => getObject(item)).filter(isRecord),
    ...getArray(msg.files).map((item) => getObject(item)).filter(isRecord),
    ...getArray(msg.content)
      .map((item) => getObject(item))
      .filter(isRecord)
      .filter((block) => ["image", "file", "document"].includes(String(block.type || "").toLowerCase()))
  ];

  for (const raw of sources) {
    const filename = getString(raw.file_name) ?? getString(raw.name) ?? getString(raw.filename);
    const mimeType = getString(raw.file_type) ?? getString(raw.mime_type);
    const localPath = getString(raw.path) ?? getString(raw.local_path);
    const localFile = localPath ? files.find(localPath) : undefined;

    let content: Buffer | undefined;
    if (localFile) {
      content = await files.read(localFile);
    } else if (typeof raw.extracted_content === "string" && raw.extracted_content) {
      content = Buffer.from(raw.extracted_content, "utf-8");
    }

    const { extracted_content: _extracted, ...metadata } = raw;
    out.push({
      provider_artifact_id: getString(raw.uuid) ?? getString(raw.id) ?? getString(raw.file_uuid),
      artifact_type: artifactTypeFor(mimeType, getString(raw.type)),
      filename,
      mime_type: mimeType,
      content,
      download_status: content ? "success" : "not_supported",
      download_error: content ? undefined : "Attachment content is not included in the export",
      raw_metadata: metadata
    });
  }
  return out;
}

async function draftOf(conversationId: string, msg: Row, files: ExportFiles): Promise<MessageDraft | undefined> {
  const providerMessageId = getString(msg.uuid) ?? getString(msg.id) ?? getString(msg.message_id);
  const role = messageRole(msg);
  const text = messageText(msg);
  const createdAt = toIsoOrUndefined(msg.created_at ?? msg.createdAt ?? msg.timestamp);
  const artifacts = await artifactsOf(msg, files);
  if (!providerMessageId && !text && !artifacts.length) return undefined;

  return {
    key: providerMessageId ?? sha256(`${conversationId}:${role}:${text}:${createdAt ?? ""}`),
    message: { provider_message_id: providerMessageId, role, content: text, created_at: createdAt },
    artifacts
  };
}

interface Bucket {
  conv?: Row;
  sourcePath: string;
  drafts: Map<string, MessageDraft>;
}

function addDraft(bucket: Bucket, draft: MessageDraft): void {
  const existing = bucket.drafts.get(draft.key);
  if (!existing) {
    bucket.drafts.set(draft.key, draft);
    return;
  }
  // The same message can appear nested and flat; keep the longer text and every artifact.
  bucket.drafts.set(draft.key, {
    key: draft.key,
    message: {
      ...existing.message,
      content: draft.message.content.length > existing.message.content.length ? draft.message.content : existing.message.content,
      created_at: existing.message.created_at ?? draft.message.created_at
    },
    artifacts: [...existing.artifacts, ...draft.artifacts]
  });
}

async function collect(docs: JsonDoc[], files: ExportFiles): Promise<Map<string, Bucket>> {
  const buckets = new Map<string, Bucket>();
  const bucketFor = (id: string, sourcePath: string): Bucket => {
    let bucket = buckets.get(id);
    if (!bucket) {
      bucket = { sourcePath, drafts: new Map() };
      buckets.set(id, bucket);
    }
    return bucket;
  };

  for (const doc of docs) {
    for (const conv of conversationsFromDoc(doc.value)) {
      const id = conversationIdOf(conv);
      const bucket = bucketFor(id, doc.relPath);
      bucket.conv = bucket.conv ?? conv;
      for (const msg of messagesOf(conv)) {
        const draft = await draftOf(id, msg, files);
        if (draft) addDraft(bucket, draft);
      }
    }
  }

  for (const doc of docs) {
    for (const msg of flatMessagesFromDoc(doc.value)) {
      const id = messageConversationId(msg);
      const draft = await draftOf(id, msg, files);
      if (draft) addDraft(bucketFor(id, doc.relPath), draft);
    }
  }

  return buckets;
}

export async function parseClaudeExport(extractedRoot: string): Promise<ExportParseResult> {
  const files = await ExportFiles.scan(extractedRoot);
  const docs = await loadJsonDocuments(extractedRoot, files.all);
  const warnings: string[] = [];
  const conversations: ProviderConversationDetail[] = [];

  for (const [providerConversationId, bucket] of await collect(docs, files)) {
    const conv = bucket.conv ?? {};
    const { messages, artifacts } = sequenceDrafts([...bucket.drafts.values()]);
    conversations.push({
      provider_conversation_id: providerConversationId,
      title: getString(conv.name) ?? getString(conv.title),
      started_at: toIsoOrUndefined(conv.created_at ?? conv.createdAt ?? messages[0]?.created_at),
      ended_at: toIsoOrUndefined(conv.updated_at ?? conv.updatedAt),
      messages,
      artifacts,
      raw_metadata: { source_path: bucket.sourcePath }
    });
  }

  if (!conversations.length) {
    warnings.push("No conversations parsed from Claude export payload.");
  }

  return { provider: "anthropic", conversations, warnings };
}
