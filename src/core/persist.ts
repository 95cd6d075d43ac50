import { randomUUID } from "node:crypto";
import { Db, toJsonText } from "../db/database";
import { toIsoOrNull } from "../lib/time";
import { ProviderArtifact, ProviderMessage } from "../providers/adapter";
import { ConversationOrigin, ImportCounts, JsonObject } from "../types/schema";
import { BlobStore } from "./blobs";
import { findExistingConversationId } from "./dedupe";

export interface NormalizedConversation {
  provider_conversation_id?: string;
  title?: string;
  started_at?: string;
  ended_at?: string;
  messages: ProviderMessage[];
  artifacts: ProviderArtifact[];
  raw_metadata?: JsonObject;
  import_notes?: string;
}

export interface WriteContext {
  providerId: string;
  importJobId: string | null;
  origin: ConversationOrigin;
}

export type WriteOutcome =
  | { status: "skipped"; conversationId: string }
  | { status: "created"; conversationId: string; counts: ImportCounts };

interface InsertResult {
  outcome: WriteOutcome;
  artifactIds: string[];
}

/**
 * Turns one normalized conversation into rows. Everything for a conversation commits in a
 * single transaction, so a failure leaves no trace of it behind. Artifact bytes go to the blob
 * store only after that commit; if storing them fails the conversation is deleted again.
 */
export class PersistenceWriter {
  private readonly insertConversation;
  private readonly insertMessage;
  private readonly insertArtifact;
  private readonly setStoragePath;
  private readonly commit;

  constructor(
    private readonly db: Db,
    private readonly blobs?: BlobStore
  ) {
    this.insertConversation = db.prepare(
      `INSERT INTO conversations
         (id, provider_id, provider_conversation_id, title, started_at, ended_at, origin, import_job_id, import_notes, raw_metadata)
       VALUES
         (@id, @provider_id, @provider_conversation_id, @title, @started_at, @ended_at, @origin, @import_job_id, @import_notes, @raw_metadata)`
    );
    this.insertMessage = db.prepare(
      `INSERT INTO messages
         (id, conversation_id, provider_message_id, role, created_at, sequence_index, content, raw_metadata)
       VALUES
         (@id, @conversation_id, @provider_message_id, @role, @created_at, @sequence_index, @content, @raw_metadata)`
    );
    this.insertArtifact = db.prepare(
      `INSERT INTO artifacts
         (id, conversation_id, message_id, artifact_type, provider_artifact_id, filename, mime_type,
          storage_path, download_status, download_error, raw_metadata)
       VALUES
         (@id, @conversation_id, @message_id, @artifact_type, @provider_artifact_id, @filename, @mime_type,
          NULL, @download_status, @download_error, @raw_metadata)`
    );
    this.setStoragePath = db.prepare("UPDATE artifacts SET storage_path = ? WHERE id = ?");
    this.commit = db.transaction(
      (conversation: NormalizedConversation, context: WriteContext): InsertResult => this.insertAll(conversation, context)
    );
  }

  async write(conversation: NormalizedConversation, context: WriteContext): Promise<WriteOutcome> {
    const existingId = findExistingConversationId(this.db, context.providerId, conversation.provider_conversation_id);
    if (existingId) {
      return { status: "skipped", conversationId: existingId };
    }

    const result = this.commit(conversation, context);
    if (result.outcome.status === "skipped") return result.outcome;

    try {
      await this.storeContent(conversation.artifacts, result.artifactIds);
    } catch (error) {
      this.db.prepare("DELETE FROM conversations WHERE id = ?").run(result.outcome.conversationId);
      throw error;
    }
    return result.outcome;
  }

  private async storeContent(artifacts: ProviderArtifact[], artifactIds: string[]): Promise<void> {
    if (!this.blobs) return;
    const stored: Array<[string, string]> = [];
    for (const [index, artifact] of artifacts.entries()) {
      if (!artifact.content) continue;
      const storagePath = await this.blobs.put({
        content: artifact.content,
        filename: artifact.filename,
        mime_type: artifact.mime_type
      });
      stored.push([storagePath, artifactIds[index]]);
    }
    if (!stored.length) return;
    this.db.transaction(() => {
      for (const [storagePath, artifactId] of stored) this.setStoragePath.run(storagePath, artifactId);
    })();
  }

  private insertAll(conversation: NormalizedConversation, context: WriteContext): InsertResult {
    // A concurrent run may have committed the same conversation since the first check.
    const existingId = findExistingConversationId(this.db, context.providerId, conversation.provider_conversation_id);
    if (existingId) {
      return { outcome: { status: "skipped", conversationId: existingId }, artifactIds: [] };
    }

    const conversationId = randomUUID();
    this.insertConversation.run({
      id: conversationId,
      provider_id: context.providerId,
      provider_conversation_id: conversation.provider_conversation_id ?? null,
      title: conversation.title ?? null,
      started_at: toIsoOrNull(conversation.started_at),
      ended_at: toIsoOrNull(conversation.ended_at),
      origin: context.origin,
      import_job_id: context.importJobId,
      import_notes: conversation.import_notes ?? null,
      raw_metadata: toJsonText(conversation.raw_metadata)
    });

    const messageIdBySequence = new Map<number, string>();
    for (const message of conversation.messages) {
      const messageId = randomUUID();
      this.insertMessage.run({
        id: messageId,
        conversation_id: conversationId,
        provider_message_id: message.provider_message_id ?? null,
        role: message.role,
        created_at: toIsoOrNull(message.created_at),
        sequence_index: message.sequence_index,
        content: message.content,
        raw_metadata: toJsonText(message.raw_metadata)
      });
      messageIdBySequence.set(message.sequence_index, messageId);
    }

    const artifactIds = conversation.artifacts.map((artifact) => {
      // An index with no matching message keeps the artifact, unlinked.
      const messageId =
        artifact.message_sequence_index === undefined
          ? null
          : messageIdBySequence.get(artifact.message_sequence_index) ?? null;
      const artifactId = randomUUID();
      this.insertArtifact.run({
        id: artifactId,
        conversation_id: conversationId,
        message_id: messageId,
        artifact_type: artifact.artifact_type,
        provider_artifact_id: artifact.provider_artifact_id ?? null,
        filename: artifact.filename ?? null,
        mime_type: artifact.mime_type ?? null,
        download_status: artifact.download_status,
        download_error: artifact.download_error ?? null,
        raw_metadata: toJsonText(artifact.raw_metadata)
      });
      return artifactId;
    });

    return {
      outcome: {
        status: "created",
        conversationId,
        counts: {
          conversations: 1,
          messages: conversation.messages.length,
          artifacts: conversation.artifacts.length
        }
      },
      artifactIds
    };
  }
}
