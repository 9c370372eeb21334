import { beforeEach, describe, expect, it } from 'vitest';
import {
  ClaudeBootstrapError,
  DEFAULT_CLAUDE_MODEL,
  initializeClaudeSdkBootstrap,
  resetClaudeSdkBootstrapCache,
} from './claudeSdkBootstrap.js';

function captureBootstrapError(env: NodeJS.ProcessEnv): ClaudeBootstrapError {
  try {
    initializeClaudeSdkBootstrap({ env });
  } catch (error) {
    if (error instanceof ClaudeBootstrapError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected bootstrap to fail');
}

describe('claude sdk bootstrap', () => {
  beforeEach(() => {
    resetClaudeSdkBootstrapCache();
  });

  it('prefers CLAUDE_API_KEY and CLAUDE_BASE_URL over the Anthropic variables', () => {
    const bootstrap = initializeClaudeSdkBootstrap({
      env: {
        CLAUDE_API_KEY: '  test-secret  ',
        ANTHROPIC_API_KEY: 'other-secret',
        CLAUDE_BASE_URL: 'https://claude-proxy.example.com/v1',
        ANTHROPIC_BASE_URL: 'https://anthropic-proxy.example.com/v1',
      },
    });

    expect(bootstrap).toEqual({
      model: DEFAULT_CLAUDE_MODEL,
      baseUrl: 'https://claude-proxy.example.com/v1',
      apiKey: 'test-secret',
      apiKeySource: 'CLAUDE_API_KEY',
      defaultTimeoutMs: undefined,
    });
  });

  it('falls back to ANTHROPIC_API_KEY and reads model and timeout overrides', () => {
    const bootstrap = initializeClaudeSdkBootstrap({
      env: {
        ANTHROPIC_API_KEY: 'test-secret',
        ANTHROPIC_BASE_URL: 'https://anthropic-proxy.example.com/v1',
        CLAUDE_MODEL: 'claude-3-5-haiku-latest',
        CLAUDE_TIMEOUT_MS: '30000',
      },
    });

    expect(bootstrap.apiKeySource).toBe('ANTHROPIC_API_KEY');
    expect(bootstrap.baseUrl).toBe('https://anthropic-proxy.example.com/v1');
    expect(bootstrap.model).toBe('claude-3-5-haiku-latest');
    expect(bootstrap.defaultTimeoutMs).toBe(30000);
  });

  it('reports a missing API key', () => {
    const error = captureBootstrapError({});

    expect(error.code).toBe('CLAUDE_BOOTSTRAP_MISSING_AUTH');
    expect(error.message).toBe('Claude model client requires an API key via CLAUDE_API_KEY or ANTHROPIC_API_KEY.');
    expect(error.details).toEqual({ checkedEnvVars: ['CLAUDE_API_KEY', 'ANTHROPIC_API_KEY'] });
  });

  it('rejects blank values for variables that are set', () => {
    const error = captureBootstrapError({ CLAUDE_API_KEY: '   ' });

    expect(error.code).toBe('CLAUDE_BOOTSTRAP_INVALID_CONFIG');
    expect(error.details).toEqual({ envKey: 'CLAUDE_API_KEY' });
  });

  it('rejects base URLs that are malformed or not http', () => {
    const malformed = captureBootstrapError({ CLAUDE_API_KEY: 'test-secret', CLAUDE_BASE_URL: 'not a url' });
    expect(malformed.code).toBe('CLAUDE_BOOTSTRAP_INVALID_CONFIG');
    expect(malformed.message).toBe('Claude model client requires CLAUDE_BASE_URL to be a valid URL when set.');

    const wrongProtocol = captureBootstrapError({ CLAUDE_API_KEY: 'test-secret', ANTHROPIC_BASE_URL: 'ftp://example.com' });
    expect(wrongProtocol.message).toBe('Claude model client requires ANTHROPIC_BASE_URL to use http or https.');
  });

  it('rejects non-positive timeouts', () => {
    const error = captureBootstrapError({ CLAUDE_API_KEY: 'test-secret', CLAUDE_TIMEOUT_MS: '-5' });

    expect(error.message).toBe('Claude model client requires CLAUDE_TIMEOUT_MS to be a positive integer.');
    expect(error.details).toEqual({ envKey: 'CLAUDE_TIMEOUT_MS', value: '-5' });
  });

  it('caches the process-environment bootstrap until reset', () => {
    const previousKey = process.env.CLAUDE_API_KEY;
    process.env.CLAUDE_API_KEY = 'test-secret';
    try {
      const first = initializeClaudeSdkBootstrap();
      process.env.CLAUDE_API_KEY = 'rotated-secret';
      expect(initializeClaudeSdkBootstrap()).toBe(first);

      resetClaudeSdkBootstrapCache();
      expect(initializeClaudeSdkBootstrap().apiKey).toBe('rotated-secret');
    } finally {
      if (previousKey === undefined) {
        delete process.env.CLAUDE_API_KEY;
      } else {
        process.env.CLAUDE_API_KEY = previousKey;
      }
    }
  });
});
