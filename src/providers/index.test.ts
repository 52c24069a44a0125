/**
 * Tests for the question provider abstraction layer
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  type ProviderName,
  type CompletionRequest,
  BaseProvider,
  ProviderRegistry,
  ProviderNotFoundError,
  createDefaultRegistry,
  isValidProvider,
  PROVIDERS,
  OpenAIProvider,
  ClaudeProvider,
} from './index.js';

/**
 * Mock provider for testing
 */
class MockProvider extends BaseProvider {
  readonly name: ProviderName = 'claude';
  readonly displayName = 'Mock Claude';

  available = true;
  requests: CompletionRequest[] = [];

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return 'Mock reply?';
  }
}

describe('isValidProvider', () => {
  it('should accept every listed provider', () => {
    for (const name of PROVIDERS) {
      expect(isValidProvider(name)).toBe(true);
    }
  });

  it('should reject unknown names', () => {
    expect(isValidProvider('cursor')).toBe(false);
    expect(isValidProvider('')).toBe(false);
  });
});

describe('ProviderRegistry', () => {
  let registry: ProviderRegistry;

  beforeEach(() => {
    registry = new ProviderRegistry();
  });

  it('should register and retrieve providers', () => {
    registry.register('claude', () => new MockProvider());

    expect(registry.get('claude').displayName).toBe('Mock Claude');
  });

  it('should pass config to the factory', () => {
    let received: unknown;
    registry.register('claude', (config) => {
      received = config;
      return new MockProvider();
    });

    registry.get('claude', { model: 'test-model' });
    expect(received).toEqual({ model: 'test-model' });
  });

  it('should throw ProviderNotFoundError for unregistered providers', () => {
    expect(() => registry.get('openai')).toThrow(ProviderNotFoundError);
    expect(() => registry.get('openai')).toThrow('Provider "openai" is not registered');
  });
});

describe('createDefaultRegistry', () => {
  it('should register the built-in providers', () => {
    const registry = createDefaultRegistry();

    expect(registry.get('openai')).toBeInstanceOf(OpenAIProvider);
    expect(registry.get('claude')).toBeInstanceOf(ClaudeProvider);
  });
});
