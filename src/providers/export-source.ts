import {
  ConversationProviderAdapter,
  ListOptions,
  ProviderArtifact,
  ProviderConversationDetail,
  ProviderConversationSummary,
  withinRange
} from "./adapter";

/** Serves already-parsed export conversations through the regular adapter contract. */
export class ExportAdapter implements ConversationProviderAdapter {
  private readonly byId = new Map<string, ProviderConversationDetail>();

  constructor(
    readonly providerName: string,
    conversations: ProviderConversationDetail[]
  ) {
    for (const conversation of conversations) {
      if (!this.byId.has(conversation.provider_conversation_id)) {
        this.byId.set(conversation.provider_conversation_id, conversation);
      }
    }
  }

  get size(): number {
    return this.byId.size;
  }

  async listConversations(_credential: string, options: ListOptions): Promise<ProviderConversationSummary[]> {
    return [...this.byId.values()]
      .filter((conversation) => withinRange(conversation.started_at, options))
      .map((conversation) => ({
        provider_conversation_id: conversation.provider_conversation_id,
        title: conversation.title,
        started_at: conversation.started_at,
        ended_at: conversation.ended_at,
        message_count: conversation.messages.length
      }));
  }

  async fetchConversation(_credential: string, providerConversationId: string): Promise<ProviderConversationDetail> {
    const conversation = this.byId.get(providerConversationId);
    if (!conversation) {
      throw new Error(`Conversation ${providerConversationId} is not part of this export`);
    }
    return conversation;
  }

  async fetchArtifacts(_credential: string, detail: ProviderConversationDetail): Promise<ProviderArtifact[]> {
    return detail.artifacts;
  }
}
