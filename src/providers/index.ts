import { ValidationError } from "../lib/errors";
import { AnthropicAdapter } from "./anthropic";
import { parseChatGPTExport } from "./chatgpt";
import { parseClaudeExport } from "./claude";
import { ExportParseResult } from "./common";
import { OpenAIAdapter } from "./openai";
import { ProviderRegistry } from "./registry";

export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry([new OpenAIAdapter(), new AnthropicAdapter()]);
}

export async function parseProviderExport(providerName: string, extractedRoot: string): Promise<ExportParseResult> {
  switch (providerName) {
    case "openai":
      return parseChatGPTExport(extractedRoot);
    case "anthropic":
      return parseClaudeExport(extractedRoot);
    default:
      throw new ValidationError(`No export parser for provider: ${providerName}`);
  }
}
