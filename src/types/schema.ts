export type ConversationOrigin = "api" | "export" | "manual";

export type JobOrigin = Exclude<ConversationOrigin, "manual">;

export type JobStatus = "running" | "success" | "partial" | "failed";

export type DownloadStatus = "pending" | "success" | "not_supported" | "error";

export type JsonObject = Record<string, unknown>;

export interface ProviderRecord {
  id: string;
  name: string;
  display_name: string;
  base_api_url: string | null;
  schema_version: string | null;
  notes: string | null;
}

/** Public view of a stored credential; the ciphertext stays inside the catalog. */
export interface ApiKeyRecord {
  id: string;
  provider_id: string;
  label: string;
  is_active: boolean;
  created_at: string;
  last_used_at: string | null;
}

export interface StoredApiKey extends ApiKeyRecord {
  key_encrypted: string;
}

export interface ProjectRecord {
  id: string;
  name: string;
  description: string | null;
  created_at: string;
}

export interface RequestedRange {
  from_date?: string;
  to_date?: string;
}

export interface ImportJobRecord {
  id: string;
  provider_id: string;
  api_key_id: string | null;
  origin: JobOrigin;
  started_at: string;
  finished_at: string | null;
  status: JobStatus;
  requested_range: RequestedRange | null;
  summary: string | null;
  error_details: string | null;
  error_count: number;
  conversations_imported: number;
  conversations_skipped: number;
  messages_imported: number;
  artifacts_imported: number;
}

export interface ConversationRecord {
  id: string;
  provider_id: string;
  provider_conversation_id: string | null;
  title: string | null;
  started_at: string | null;
  ended_at: string | null;
  origin: ConversationOrigin;
  import_job_id: string | null;
  import_notes: string | null;
  archived: boolean;
  raw_metadata: JsonObject | null;
}

export interface MessageRecord {
  id: string;
  conversation_id: string;
  provider_message_id: string | null;
  role: string;
  created_at: string | null;
  sequence_index: number;
  content: string;
  raw_metadata: JsonObject | null;
}

export interface ArtifactRecord {
  id: string;
  conversation_id: string;
  message_id: string | null;
  artifact_type: string;
  provider_artifact_id: string | null;
  filename: string | null;
  mime_type: string | null;
  storage_path: string | null;
  download_status: DownloadStatus;
  download_error: string | null;
  notes: string | null;
  raw_metadata: JsonObject | null;
}

export interface ConversationListItem {
  id: string;
  provider_id: string;
  title: string | null;
  started_at: string | null;
  origin: ConversationOrigin;
  message_count: number;
  has_artifacts: boolean;
  /** Names of the projects the conversation is filed under. */
  projects: string[];
}

export interface ConversationDetail extends ConversationRecord {
  messages: MessageRecord[];
  artifacts: ArtifactRecord[];
  project_ids: string[];
}

export interface ImportCounts {
  conversations: number;
  messages: number;
  artifacts: number;
}
