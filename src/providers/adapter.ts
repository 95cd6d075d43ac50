import { DownloadStatus, JsonObject } from "../types/schema";

export interface ProviderMessage {
  provider_message_id?: string;
  role: string;
  content: string;
  created_at?: string;
  /** Position inside the conversation; persisted verbatim and used for display order. */
  sequence_index: number;
  raw_metadata?: JsonObject;
}

export interface ProviderArtifact {
  provider_artifact_id?: string;
  artifact_type: string;
  filename?: string;
  mime_type?: string;
  content?: Buffer;
  download_status: DownloadStatus;
  download_error?: string;
  /** Sequence index of the message this artifact belongs to, if any. */
  message_sequence_index?: number;
  raw_metadata?: JsonObject;
}

export interface ProviderConversationSummary {
  provider_conversation_id: string;
  title?: string;
  started_at?: string;
  ended_at?: string;
  message_count?: number;
  raw_metadata?: JsonObject;
}

export interface ProviderConversationDetail {
  provider_conversation_id: string;
  title?: string;
  started_at?: string;
  ended_at?: string;
  messages: ProviderMessage[];
  artifacts: ProviderArtifact[];
  raw_metadata?: JsonObject;
}

/** Only these keys are read by adapters; anything else in a caller's options is ignored. */
export interface ListOptions {
  fromDate?: Date;
  toDate?: Date;
}

export interface ConversationProviderAdapter {
  readonly providerName: string;
  listConversations(credential: string, options: ListOptions): Promise<ProviderConversationSummary[]>;
  fetchConversation(credential: string, providerConversationId: string): Promise<ProviderConversationDetail>;
  fetchArtifacts(credential: string, detail: ProviderConversationDetail): Promise<ProviderArtifact[]>;
}

export function withinRange(startedAt: string | undefined, options: ListOptions): boolean {
  if (!startedAt) return true;
  const at = new Date(startedAt).getTime();
  if (Number.isNaN(at)) return true;
  if (options.fromDate && at < options.fromDate.getTime()) return false;
  if (options.toDate && at > options.toDate.getTime()) return false;
  return true;
}
