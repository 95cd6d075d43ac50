import { Db, parseJsonObject } from "../db/database";
import { NotFoundError, ValidationError } from "../lib/errors";
import {
  ArtifactRecord,
  ConversationDetail,
  ConversationListItem,
  ConversationOrigin,
  ConversationRecord,
  JsonObject,
  MessageRecord
} from "../types/schema";
import { Catalog } from "./catalog";
import { PersistenceWriter } from "./persist";

interface ConversationRow extends Omit<ConversationRecord, "archived" | "raw_metadata"> {
  archived: number;
  raw_metadata: string | null;
}

interface MessageRow extends Omit<MessageRecord, "raw_metadata"> {
  raw_metadata: string | null;
}

interface ArtifactRow extends Omit<ArtifactRecord, "raw_metadata"> {
  raw_metadata: string | null;
}

interface ListRow {
  id: string;
  provider_id: string;
  title: string | null;
  started_at: string | null;
  origin: ConversationOrigin;
  message_count: number;
  artifact_count: number;
}

export interface ConversationFilter {
  providerId?: string;
  projectId?: string;
}

export interface ManualConversationInput {
  title?: string;
  started_at?: string;
  messages: Array<{ role: string; content: string; created_at?: string; metadata?: JsonObject }>;
  metadata?: JsonObject;
  notes?: string;
}

export class ConversationStore {
  constructor(
    private readonly db: Db,
    private readonly catalog: Catalog,
    private readonly writer: PersistenceWriter
  ) {}

  list(filter: ConversationFilter = {}): ConversationListItem[] {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.providerId) {
      clauses.push("c.provider_id = ?");
      params.push(filter.providerId);
    }
    if (filter.projectId) {
      clauses.push("EXISTS (SELECT 1 FROM conversation_projects f WHERE f.conversation_id = c.id AND f.project_id = ?)");
      params.push(filter.projectId);
    }
    const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";
    const sql = `
      SELECT c.id, c.provider_id, c.title, c.started_at, c.origin,
             (SELECT COUNT(*) FROM messages m WHERE m.conversation_id = c.id) AS message_count,
             (SELECT COUNT(*) FROM artifacts a WHERE a.conversation_id = c.id) AS artifact_count
        FROM conversations c
        ${where}
       ORDER BY c.started_at IS NULL, c.started_at DESC, c.rowid DESC`;
    const rows = this.db.prepare<string[], ListRow>(sql).all(...params);
    const projectNames = this.projectNamesByConversation();
    return rows.map((row) => ({
      id: row.id,
      provider_id: row.provider_id,
      title: row.title,
      started_at: row.started_at,
      origin: row.origin,
      message_count: row.message_count,
      has_artifacts: row.artifact_count > 0,
      projects: projectNames.get(row.id) ?? []
    }));
  }

  get(id: string): ConversationDetail {
    const row = this.db.prepare<[string], ConversationRow>("SELECT * FROM conversations WHERE id = ?").get(id);
    if (!row) throw new NotFoundError("Conversation not found");

    const messages = this.db
      .prepare<[string], MessageRow>("SELECT * FROM messages WHERE conversation_id = ? ORDER BY sequence_index ASC")
      .all(id)
      .map((message) => ({ ...message, raw_metadata: parseJsonObject(message.raw_metadata) }));

    const artifacts = this.db
      .prepare<[string], ArtifactRow>("SELECT * FROM artifacts WHERE conversation_id = ? ORDER BY rowid ASC")
      .all(id)
      .map((artifact) => ({ ...artifact, raw_metadata: parseJsonObject(artifact.raw_metadata) }));

    const projectIds = this.db
      .prepare<[string], { project_id: string }>(
        "SELECT project_id FROM conversation_projects WHERE conversation_id = ? ORDER BY project_id"
      )
      .all(id)
      .map((link) => link.project_id);

    return {
      ...row,
      archived: row.archived === 1,
      raw_metadata: parseJsonObject(row.raw_metadata),
      messages,
      artifacts,
      project_ids: projectIds
    };
  }

  delete(id: string): void {
    const result = this.db.prepare("DELETE FROM conversations WHERE id = ?").run(id);
    if (result.changes === 0) throw new NotFoundError("Conversation not found");
  }

  assignProject(conversationId: string, projectId: string): void {
    this.requireConversation(conversationId);
    if (!this.catalog.getProject(projectId)) throw new NotFoundError("Project not found");
    this.db
      .prepare("INSERT OR IGNORE INTO conversation_projects (conversation_id, project_id) VALUES (?, ?)")
      .run(conversationId, projectId);
  }

  unassignProject(conversationId: string, projectId: string): void {
    const result = this.db
      .prepare("DELETE FROM conversation_projects WHERE conversation_id = ? AND project_id = ?")
      .run(conversationId, projectId);
    if (result.changes === 0) throw new NotFoundError("Conversation is not in this project");
  }

  /** Manual entries carry no provider-native id, so each call creates a new conversation. */
  async createManual(providerId: string, input: ManualConversationInput): Promise<ConversationDetail> {
    this.catalog.requireProvider(providerId);
    if (!input.messages.length) throw new ValidationError("A manual conversation needs at least one message");

    const outcome = await this.writer.write(
      {
        title: input.title,
        started_at: input.started_at,
        messages: input.messages.map((message, index) => ({
          role: message.role,
          content: message.content,
          created_at: message.created_at,
          sequence_index: index,
          raw_metadata: message.metadata
        })),
        artifacts: [],
        raw_metadata: input.metadata,
        import_notes: input.notes
      },
      { providerId, importJobId: null, origin: "manual" }
    );
    return this.get(outcome.conversationId);
  }

  private projectNamesByConversation(): Map<string, string[]> {
    const links = this.db
      .prepare<[], { conversation_id: string; name: string }>(
        `SELECT cp.conversation_id, p.name
           FROM conversation_projects cp
           JOIN projects p ON p.id = cp.project_id
          ORDER BY p.name`
      )
      .all();
    const byConversation = new Map<string, string[]>();
    for (const link of links) {
      const names = byConversation.get(link.conversation_id) ?? [];
      names.push(link.name);
      byConversation.set(link.conversation_id, names);
    }
    return byConversation;
  }

  private requireConversation(id: string): void {
    const row = this.db.prepare<[string], { id: string }>("SELECT id FROM conversations WHERE id = ?").get(id);
    if (!row) throw new NotFoundError("Conversation not found");
  }
}
