/**
 * OpenAI provider
 * Also works with OpenAI-compatible APIs through OPENAI_BASE_URL
 */

import OpenAI, { APIError } from 'openai';
import {
  BaseProvider,
  ProviderNotAvailableError,
  type CompletionRequest,
  type ProviderConfig,
  type ProviderName,
} from './base.js';
import { IntakeError, ProviderError } from '../core/error-recovery.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

const PLACEHOLDER_KEY = /^(?:your[-_]|<|sk-\.\.\.|changeme)/i;

/**
 * Whether a key looks like a real credential rather than a template value
 */
export function isUsableApiKey(key: string | undefined): key is string {
  return typeof key === 'string' && key.trim().length > 0 && !PLACEHOLDER_KEY.test(key.trim());
}

/**
 * OpenAI chat completions provider
 */
export class OpenAIProvider extends BaseProvider {
  readonly name: ProviderName = 'openai';
  readonly displayName = 'OpenAI';

  private readonly config: ProviderConfig;
  private client: OpenAI | null = null;

  constructor(config: ProviderConfig = {}) {
    super();
    this.config = config;
  }

  private getApiKey(): string | undefined {
    return this.config.apiKey ?? process.env['OPENAI_API_KEY'];
  }

  /**
   * Available when an API key is configured. No request is made.
   */
  async isAvailable(): Promise<boolean> {
    return isUsableApiKey(this.getApiKey());
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    const apiKey = this.getApiKey();
    if (!isUsableApiKey(apiKey)) {
      throw new ProviderNotAvailableError(this.name, 'OPENAI_API_KEY is not set');
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: this.config.baseUrl ?? process.env['OPENAI_BASE_URL'],
      maxRetries: 0,
    });
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const client = this.getClient();

    try {
      const response = await client.chat.completions.create(
        {
          model: this.config.model ?? DEFAULT_OPENAI_MODEL,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.prompt },
          ],
          max_tokens: 500,
          temperature: 0.7,
        },
        { signal: request.signal }
      );

      const content = response.choices[0]?.message?.content ?? '';
      if (!content.trim()) {
        throw new ProviderError('OpenAI returned an empty reply', undefined, {
          provider: this.name,
        });
      }
      return content;
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private handleError(error: unknown): Error {
    if (error instanceof IntakeError) {
      return error;
    }

    if (error instanceof APIError) {
      const retryable = error.status === undefined || error.status === 429 || error.status >= 500;
      return new IntakeError(`OpenAI API error: ${error.message}`, 'provider', {
        recoverable: retryable,
        cause: error,
        context: { provider: this.name, statusCode: error.status },
      });
    }

    return error instanceof Error ? error : new ProviderError(String(error));
  }
}

/**
 * Factory function for creating OpenAIProvider instances
 */
export function createOpenAIProvider(config?: ProviderConfig): OpenAIProvider {
  return new OpenAIProvider(config);
}
