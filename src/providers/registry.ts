import type { ReplyModelClient } from '@pocket-pet/core';
import type { PetConfig } from '../config/petConfig';
import { GeminiProvider } from './gemini/geminiProvider';
import { MockProvider } from './mock/mockProvider';
import type { ReplyProvider } from './types';

export class ProviderRegistry {
  private readonly providers = new Map<string, ReplyProvider>();

  constructor(initialProviders: ReplyProvider[] = []) {
    for (const provider of initialProviders) {
      this.providers.set(provider.id, provider);
    }
  }

  resolve(providerId: string): ReplyProvider {
    const provider = this.providers.get(providerId);
    if (!provider) {
      throw new Error(`Unknown provider: ${providerId}`);
    }
    return provider;
  }
}

export const createProviderRegistry = (config: PetConfig): ProviderRegistry => {
  return new ProviderRegistry([
    new GeminiProvider({ apiKey: config.geminiApiKey ?? undefined, model: config.llmModel }),
    new MockProvider(),
  ]);
};

/** The configured chat collaborator, or null when replies should stay deterministic. */
export const resolveReplyClient = (
  config: PetConfig,
  registry: ProviderRegistry = createProviderRegistry(config)
): ReplyModelClient | null => {
  if (config.llmProvider === 'deterministic') {
    return null;
  }
  return registry.resolve(config.llmProvider);
};
