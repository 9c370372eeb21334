import type { ModelCallConfig, ModelClient } from '@flowpilot/shared';
import { describe, expect, it } from 'vitest';
import { ClaudeModelClient } from './providers/claude.js';
import {
  UnknownModelProviderError,
  createDefaultModelClientRegistry,
  createModelClientResolver,
  resolveModelClient,
} from './registry.js';

class EchoModelClient implements ModelClient {
  readonly name = 'echo';

  async complete(prompt: string, _config: ModelCallConfig): Promise<string> {
    return prompt;
  }
}

describe('model client registry', () => {
  it('resolves the default claude client', () => {
    expect(resolveModelClient('claude')).toBeInstanceOf(ClaudeModelClient);
    expect(Object.keys(createDefaultModelClientRegistry())).toEqual(['claude']);
  });

  it('throws a typed error listing the available providers', () => {
    let caught: unknown;
    try {
      resolveModelClient('unknown-provider');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnknownModelProviderError);
    if (!(caught instanceof UnknownModelProviderError)) {
      return;
    }
    expect(caught.code).toBe('UNKNOWN_MODEL_PROVIDER');
    expect(caught.providerName).toBe('unknown-provider');
    expect(caught.availableProviders).toEqual(['claude']);
    expect(caught.message).toBe('Unknown model provider "unknown-provider". Available providers: claude.');
  });

  it('supports custom registries and does not resolve inherited keys', () => {
    const echo = new EchoModelClient();
    const resolver = createModelClientResolver({ echo, claude: new ClaudeModelClient() });

    expect(resolver('echo')).toBe(echo);
    expect(() => resolver('toString')).toThrow(
      'Unknown model provider "toString". Available providers: claude, echo.',
    );
  });

  it('reports an empty registry as (none)', () => {
    expect(() => createModelClientResolver({})('claude')).toThrow(
      'Unknown model provider "claude". Available providers: (none).',
    );
  });
});
