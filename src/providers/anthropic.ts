import {
  ConversationProviderAdapter,
  ListOptions,
  ProviderArtifact,
  ProviderConversationDetail,
  ProviderConversationSummary
} from "./adapter";

// claude.ai history is not reachable with an API key; exports go through `./claude`.
export class AnthropicAdapter implements ConversationProviderAdapter {
  readonly providerName = "anthropic";

  async listConversations(_credential: string, _options: ListOptions): Promise<ProviderConversationSummary[]> {
    return [];
  }

  async fetchConversation(_credential: string, providerConversationId: string): Promise<ProviderConversationDetail> {
    throw new Error(`Anthropic API does not serve conversation ${providerConversationId}; import a Claude export instead.`);
  }

  async fetchArtifacts(_credential: string, detail: ProviderConversationDetail): Promise<ProviderArtifact[]> {
    return detail.artifacts.map((artifact): ProviderArtifact =>
      artifact.download_status === "pending"
        ? { ...artifact, download_status: "not_supported" }
        : artifact
    );
  }
}
