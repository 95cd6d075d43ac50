import {
  ConversationProviderAdapter,
  ListOptions,
  ProviderArtifact,
  ProviderConversationDetail,
  ProviderConversationSummary
} from "./adapter";

/**
 * OpenAI exposes no endpoint for ChatGPT history, so the API adapter lists nothing.
 * ChatGPT data reaches the archive through the export parser in `./chatgpt`.
 */
export class OpenAIAdapter implements ConversationProviderAdapter {
  readonly providerName = "openai";

  async listConversations(_credential: string, _options: ListOptions): Promise<ProviderConversationSummary[]> {
    return [];
  }

  async fetchConversation(_credential: string, providerConversationId: string): Promise<ProviderConversationDetail> {
    throw new Error(`OpenAI API does not serve conversation ${providerConversationId}; import a ChatGPT export instead.`);
  }

  async fetchArtifacts(_credential: string, detail: ProviderConversationDetail): Promise<ProviderArtifact[]> {
    return detail.artifacts.map((artifact): ProviderArtifact =>
      artifact.download_status === "pending"
        ? { ...artifact, download_status: "not_supported" }
        : artifact
    );
  }
}
