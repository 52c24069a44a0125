/**
 * Claude Code CLI Provider
 * Runs one `claude --print` process per request
 */

import { spawn } from 'node:child_process';
import { BaseProvider, commandExists, type CompletionRequest, type ProviderName } from './base.js';
import { ProcessError, ProviderError } from '../core/error-recovery.js';

/**
 * Claude Code CLI Provider
 *
 * Writes the prompt to stdin and reads the whole reply from stdout.
 */
export class ClaudeProvider extends BaseProvider {
  readonly name: ProviderName = 'claude';
  readonly displayName = 'Claude Code';
  readonly command = 'claude';

  async isAvailable(): Promise<boolean> {
    return commandExists(this.command);
  }

  complete(request: CompletionRequest): Promise<string> {
    const { signal } = request;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ProcessError(`${this.command} was aborted before it started`));
        return;
      }

      const child = spawn(this.command, ['--print'], {
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        outcome();
      };

      const onAbort = (): void => {
        child.kill('SIGTERM');
        finish(() => reject(new ProcessError(`${this.command} was aborted`, { signal: 'SIGTERM' })));
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf-8');
      });

      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf-8');
      });

      child.on('error', (error: Error) => {
        finish(() =>
          reject(new ProcessError(`Failed to spawn ${this.command}: ${error.message}`, { cause: error }))
        );
      });

      child.on('close', (code: number | null, exitSignal: string | null) => {
        if (code === 0) {
          const reply = stdout.trim();
          finish(() =>
            reply
              ? resolve(reply)
              : reject(new ProviderError(`${this.command} returned an empty reply`))
          );
          return;
        }

        const detail = stderr.trim();
        finish(() =>
          reject(
            new ProcessError(
              `${this.command} exited with code ${code}${detail ? `: ${detail}` : ''}`,
              { exitCode: code ?? undefined, signal: exitSignal ?? undefined }
            )
          )
        );
      });

      child.stdin?.on('error', (error: Error) => {
        finish(() =>
          reject(new ProcessError(`Failed to write prompt to ${this.command}: ${error.message}`, { cause: error }))
        );
      });

      child.stdin?.write(`${request.systemPrompt}\n\n${request.prompt}\n`, 'utf-8');
      child.stdin?.end();
    });
  }
}

/**
 * Factory function for creating ClaudeProvider instances
 */
export function createClaudeProvider(): ClaudeProvider {
  return new ClaudeProvider();
}
