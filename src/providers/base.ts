/**
 * Base classes and interfaces for question providers
 */

import { promisify } from 'node:util';
import { exec as execCallback } from 'node:child_process';

const exec = promisify(execCallback);

export type ProviderName = 'openai' | 'claude';

export interface ProviderConfig {
  /** Model identifier passed to API-backed providers */
  model?: string;
  /** API key; falls back to the provider's environment variable */
  apiKey?: string;
  /** Base URL for OpenAI-compatible APIs */
  baseUrl?: string;
}

export interface CompletionRequest {
  /** Instructions that frame the reply */
  systemPrompt: string;
  /** The actual request */
  prompt: string;
  /** Aborts the request when fired */
  signal?: AbortSignal;
}

/**
 * Interface that all question providers must implement
 */
export interface QuestionProvider {
  /** Unique name of the provider */
  readonly name: ProviderName;

  /** Human-readable display name */
  readonly displayName: string;

  /**
   * Check whether the provider can be used (credentials present, CLI installed)
   */
  isAvailable(): Promise<boolean>;

  /**
   * Produce a single text reply
   * @throws ProviderError, ProcessError or a network error on failure
   */
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * Base class for providers with common functionality
 */
export abstract class BaseProvider implements QuestionProvider {
  abstract readonly name: ProviderName;
  abstract readonly displayName: string;

  abstract isAvailable(): Promise<boolean>;
  abstract complete(request: CompletionRequest): Promise<string>;
}

/**
 * Check whether a command is on the PATH
 */
export async function commandExists(command: string): Promise<boolean> {
  try {
    await exec(`which ${command}`);
    return true;
  } catch {
    return false;
  }
}

/**
 * Error thrown when a provider is not found in the registry
 */
export class ProviderNotFoundError extends Error {
  constructor(name: string) {
    super(`Provider "${name}" is not registered`);
    this.name = 'ProviderNotFoundError';
  }
}

/**
 * Error thrown when a provider cannot be used
 */
export class ProviderNotAvailableError extends Error {
  constructor(name: string, reason: string) {
    super(`Provider "${name}" is not available: ${reason}`);
    this.name = 'ProviderNotAvailableError';
  }
}

/**
 * Factory function type for creating provider instances
 */
export type ProviderFactory = (config?: ProviderConfig) => QuestionProvider;
