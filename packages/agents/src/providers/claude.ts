import { query, type Options as ClaudeQueryOptions } from '@anthropic-ai/claude-agent-sdk';
import { ModelClientError, type ModelCallConfig, type ModelClient } from '@flowpilot/shared';
import { ClaudeBootstrapError, type ClaudeSdkBootstrap, initializeClaudeSdkBootstrap } from './claudeSdkBootstrap.js';

// Structural view of the SDK's query(); the real export satisfies it.
export type ClaudeSdkQuery = (params: { prompt: string; options: ClaudeQueryOptions }) => AsyncIterable<unknown>;
export type ClaudeBootstrapper = () => ClaudeSdkBootstrap;

export type ClaudeModelClientOptions = {
  sdkQuery?: ClaudeSdkQuery;
  bootstrap?: ClaudeBootstrapper;
};

type ClaudeStreamEntry =
  | { kind: 'assistant_text'; text: string }
  | { kind: 'result'; text: string | undefined }
  | { kind: 'failure'; subtype: string; errors: string[] }
  | { kind: 'ignored' };

const CLAUDE_PROVIDER_NAME = 'claude';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function collectAssistantText(message: Record<string, unknown>): string {
  const body = message.message;
  if (!isRecord(body) || !Array.isArray(body.content)) {
    return '';
  }

  return body.content
    .filter(isRecord)
    .filter(block => block.type === 'text' && typeof block.text === 'string')
    .map(block => String(block.text))
    .join('');
}

function readStreamEntry(sdkMessage: unknown): ClaudeStreamEntry {
  if (!isRecord(sdkMessage)) {
    return { kind: 'ignored' };
  }

  if (sdkMessage.type === 'assistant') {
    return { kind: 'assistant_text', text: collectAssistantText(sdkMessage) };
  }

  if (sdkMessage.type !== 'result') {
    return { kind: 'ignored' };
  }

  const subtype = typeof sdkMessage.subtype === 'string' ? sdkMessage.subtype : 'unknown';
  if (subtype !== 'success') {
    const errors = Array.isArray(sdkMessage.errors)
      ? sdkMessage.errors.filter((value): value is string => typeof value === 'string' && value.trim().length > 0)
      : [];
    return { kind: 'failure', subtype, errors };
  }

  return { kind: 'result', text: typeof sdkMessage.result === 'string' ? sdkMessage.result : undefined };
}

function createClaudeQueryEnvironment(
  bootstrap: ClaudeSdkBootstrap,
  config: ModelCallConfig,
): Record<string, string | undefined> {
  const env: Record<string, string | undefined> = {
    ...process.env,
    CLAUDE_API_KEY: bootstrap.apiKey,
    ANTHROPIC_API_KEY: bootstrap.apiKey,
  };

  if (bootstrap.baseUrl) {
    env.CLAUDE_BASE_URL = bootstrap.baseUrl;
    env.ANTHROPIC_BASE_URL = bootstrap.baseUrl;
  }

  if (config.maxTokens !== undefined) {
    env.CLAUDE_CODE_MAX_OUTPUT_TOKENS = String(config.maxTokens);
  }

  return env;
}

function createClaudeQueryOptions(
  bootstrap: ClaudeSdkBootstrap,
  config: ModelCallConfig,
  abortController: AbortController,
): ClaudeQueryOptions {
  return {
    model: config.model ?? bootstrap.model,
    env: createClaudeQueryEnvironment(bootstrap, config),
    abortController,
    // A decision is a single completion; the agent may not call tools or take further turns.
    maxTurns: 1,
    allowedTools: [],
  };
}

/**
 * Model client backed by the Claude Agent SDK. Each call runs one single-turn query and returns the
 * text of its result message. Failures surface as ModelClientError so decision handlers can report
 * a stable code.
 */
export class ClaudeModelClient implements ModelClient {
  readonly name = CLAUDE_PROVIDER_NAME;
  readonly #sdkQuery: ClaudeSdkQuery;
  readonly #bootstrap: ClaudeBootstrapper;

  constructor(options: ClaudeModelClientOptions = {}) {
    this.#sdkQuery = options.sdkQuery ?? query;
    this.#bootstrap = options.bootstrap ?? (() => initializeClaudeSdkBootstrap());
  }

  #resolveBootstrap(): ClaudeSdkBootstrap {
    try {
      return this.#bootstrap();
    } catch (error) {
      if (error instanceof ClaudeBootstrapError) {
        throw new ModelClientError('MODEL_UNAVAILABLE', error.message, { provider: this.name, cause: error });
      }
      throw error;
    }
  }

  async complete(prompt: string, config: ModelCallConfig): Promise<string> {
    const bootstrap = this.#resolveBootstrap();
    const timeout = config.timeout ?? bootstrap.defaultTimeoutMs;
    const abortController = new AbortController();
    let timedOut = false;

    const timeoutHandle = timeout === undefined
      ? undefined
      : setTimeout(() => {
        timedOut = true;
        abortController.abort();
      }, timeout);
    const onCallerAbort = () => abortController.abort();
    if (config.signal?.aborted) {
      abortController.abort();
    } else {
      config.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    let assistantText = '';
    try {
      if (abortController.signal.aborted) {
        throw new ModelClientError('MODEL_UNAVAILABLE', 'Claude call was aborted before it started.', {
          provider: this.name,
        });
      }

      const stream = this.#sdkQuery({
        prompt,
        options: createClaudeQueryOptions(bootstrap, config, abortController),
      });

      for await (const sdkMessage of stream) {
        const entry = readStreamEntry(sdkMessage);
        switch (entry.kind) {
          case 'assistant_text':
            assistantText += entry.text;
            break;
          case 'failure':
            throw new ModelClientError(
              'MODEL_UNAVAILABLE',
              `Claude call failed: ${entry.errors[0] ?? `result subtype "${entry.subtype}"`}`,
              { provider: this.name },
            );
          case 'result':
            return entry.text ?? assistantText;
          case 'ignored':
            break;
        }
      }

      throw new ModelClientError('MODEL_UNAVAILABLE', 'Claude stream ended without a result message.', {
        provider: this.name,
      });
    } catch (error) {
      if (timedOut) {
        throw new ModelClientError('MODEL_TIMEOUT', `Claude did not respond within ${timeout} ms.`, {
          provider: this.name,
          cause: error,
        });
      }

      if (error instanceof ModelClientError) {
        throw error;
      }

      throw new ModelClientError('MODEL_UNAVAILABLE', `Claude call failed: ${describeError(error)}`, {
        provider: this.name,
        cause: error,
      });
    } finally {
      if (timeoutHandle !== undefined) {
        clearTimeout(timeoutHandle);
      }
      config.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
