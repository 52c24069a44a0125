/**
 * Question provider abstraction layer
 * Provides interface and registry for the backends that write technical questions
 */

import {
  type ProviderName,
  type ProviderConfig,
  type QuestionProvider,
  type ProviderFactory,
  ProviderNotFoundError,
} from './base.js';
import { createClaudeProvider } from './claude.js';
import { createOpenAIProvider } from './openai.js';

export {
  type ProviderName,
  type ProviderConfig,
  type CompletionRequest,
  type QuestionProvider,
  type ProviderFactory,
  BaseProvider,
  commandExists,
  ProviderNotFoundError,
  ProviderNotAvailableError,
} from './base.js';

/**
 * Names accepted for --provider and questionProvider; "static" means no provider
 */
export const PROVIDERS = ['openai', 'claude', 'static'] as const;

export type ProviderChoice = (typeof PROVIDERS)[number];

export function isValidProvider(value: string): value is ProviderChoice {
  return PROVIDERS.some((provider) => provider === value);
}

/**
 * Provider Registry - manages registration and retrieval of question providers
 */
export class ProviderRegistry {
  private providers: Map<ProviderName, ProviderFactory> = new Map();

  /**
   * Register a new provider factory
   */
  register(name: ProviderName, factory: ProviderFactory): void {
    this.providers.set(name, factory);
  }

  /**
   * Get a provider instance by name
   * @throws ProviderNotFoundError if provider is not registered
   */
  get(name: ProviderName, config?: ProviderConfig): QuestionProvider {
    const factory = this.providers.get(name);
    if (!factory) {
      throw new ProviderNotFoundError(name);
    }
    return factory(config);
  }
}

/**
 * Create a registry with the built-in providers
 */
export function createDefaultRegistry(): ProviderRegistry {
  const registry = new ProviderRegistry();
  registry.register('openai', createOpenAIProvider);
  registry.register('claude', createClaudeProvider);
  return registry;
}

/**
 * Global provider registry instance
 */
export const providerRegistry = createDefaultRegistry();

export { ClaudeProvider, createClaudeProvider } from './claude.js';
export { OpenAIProvider, createOpenAIProvider, isUsableApiKey, DEFAULT_OPENAI_MODEL } from './openai.js';
