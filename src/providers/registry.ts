import { ConversationProviderAdapter } from "./adapter";

export type AdapterLookup =
  | { found: true; adapter: ConversationProviderAdapter }
  | { found: false; providerName: string };

export class ProviderRegistry {
  private readonly adapters = new Map<string, ConversationProviderAdapter>();

  constructor(adapters: ConversationProviderAdapter[] = []) {
    for (const adapter of adapters) this.register(adapter);
  }

  register(adapter: ConversationProviderAdapter): void {
    this.adapters.set(adapter.providerName, adapter);
  }

  lookup(providerName: string): AdapterLookup {
    const adapter = this.adapters.get(providerName);
    return adapter ? { found: true, adapter } : { found: false, providerName };
  }

  has(providerName: string): boolean {
    return this.adapters.has(providerName);
  }

  providerNames(): string[] {
    return [...this.adapters.keys()];
  }
}
