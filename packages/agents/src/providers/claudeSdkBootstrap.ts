const CLAUDE_API_KEY_ENV_VAR = 'CLAUDE_API_KEY';
const ANTHROPIC_API_KEY_ENV_VAR = 'ANTHROPIC_API_KEY';
const CLAUDE_MODEL_ENV_VAR = 'CLAUDE_MODEL';
const CLAUDE_BASE_URL_ENV_VAR = 'CLAUDE_BASE_URL';
const ANTHROPIC_BASE_URL_ENV_VAR = 'ANTHROPIC_BASE_URL';
const CLAUDE_TIMEOUT_ENV_VAR = 'CLAUDE_TIMEOUT_MS';

export const DEFAULT_CLAUDE_MODEL = 'claude-3-7-sonnet-latest';

export type ClaudeBootstrapErrorCode = 'CLAUDE_BOOTSTRAP_INVALID_CONFIG' | 'CLAUDE_BOOTSTRAP_MISSING_AUTH';

export class ClaudeBootstrapError extends Error {
  readonly code: ClaudeBootstrapErrorCode;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;

  constructor(
    code: ClaudeBootstrapErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'ClaudeBootstrapError';
    this.code = code;
    this.details = details;
    this.cause = cause;
  }
}

export type ClaudeBootstrapOverrides = Readonly<{
  env?: NodeJS.ProcessEnv;
}>;

export type ClaudeApiKeySource = typeof CLAUDE_API_KEY_ENV_VAR | typeof ANTHROPIC_API_KEY_ENV_VAR;

export type ClaudeSdkBootstrap = Readonly<{
  model: string;
  baseUrl?: string;
  apiKey: string;
  apiKeySource: ClaudeApiKeySource;
  // Applied when a call carries no timeout of its own.
  defaultTimeoutMs?: number;
}>;

let cachedBootstrap: ClaudeSdkBootstrap | undefined;

function readConfiguredEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const rawValue = env[key];
  if (rawValue === undefined) {
    return undefined;
  }

  const normalizedValue = rawValue.trim();
  if (normalizedValue.length === 0) {
    throw new ClaudeBootstrapError(
      'CLAUDE_BOOTSTRAP_INVALID_CONFIG',
      `Claude model client requires ${key} to be a non-empty string when set.`,
      { envKey: key },
    );
  }

  return normalizedValue;
}

function resolveBaseUrl(env: NodeJS.ProcessEnv): string | undefined {
  const claudeBaseUrl = readConfiguredEnvValue(env, CLAUDE_BASE_URL_ENV_VAR);
  const baseUrl = claudeBaseUrl ?? readConfiguredEnvValue(env, ANTHROPIC_BASE_URL_ENV_VAR);
  if (baseUrl === undefined) {
    return undefined;
  }

  const sourceEnvKey = claudeBaseUrl ? CLAUDE_BASE_URL_ENV_VAR : ANTHROPIC_BASE_URL_ENV_VAR;
  let parsedBaseUrl: URL;
  try {
    parsedBaseUrl = new URL(baseUrl);
  } catch (error) {
    throw new ClaudeBootstrapError(
      'CLAUDE_BOOTSTRAP_INVALID_CONFIG',
      `Claude model client requires ${sourceEnvKey} to be a valid URL when set.`,
      { envKey: sourceEnvKey, baseUrl },
      error,
    );
  }

  if (parsedBaseUrl.protocol !== 'http:' && parsedBaseUrl.protocol !== 'https:') {
    throw new ClaudeBootstrapError(
      'CLAUDE_BOOTSTRAP_INVALID_CONFIG',
      `Claude model client requires ${sourceEnvKey} to use http or https.`,
      { envKey: sourceEnvKey, baseUrl },
    );
  }

  return parsedBaseUrl.toString();
}

function resolveDefaultTimeout(env: NodeJS.ProcessEnv): number | undefined {
  const rawTimeout = readConfiguredEnvValue(env, CLAUDE_TIMEOUT_ENV_VAR);
  if (rawTimeout === undefined) {
    return undefined;
  }

  const timeout = Number(rawTimeout);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ClaudeBootstrapError(
      'CLAUDE_BOOTSTRAP_INVALID_CONFIG',
      `Claude model client requires ${CLAUDE_TIMEOUT_ENV_VAR} to be a positive integer.`,
      { envKey: CLAUDE_TIMEOUT_ENV_VAR, value: rawTimeout },
    );
  }

  return timeout;
}

function resolveApiKey(env: NodeJS.ProcessEnv): { apiKey: string; apiKeySource: ClaudeApiKeySource } | undefined {
  const claudeApiKey = readConfiguredEnvValue(env, CLAUDE_API_KEY_ENV_VAR);
  if (claudeApiKey !== undefined) {
    return { apiKey: claudeApiKey, apiKeySource: CLAUDE_API_KEY_ENV_VAR };
  }

  const anthropicApiKey = readConfiguredEnvValue(env, ANTHROPIC_API_KEY_ENV_VAR);
  if (anthropicApiKey !== undefined) {
    return { apiKey: anthropicApiKey, apiKeySource: ANTHROPIC_API_KEY_ENV_VAR };
  }

  return undefined;
}

export function resetClaudeSdkBootstrapCache(): void {
  cachedBootstrap = undefined;
}

/**
 * Reads Claude credentials and defaults from the environment. Calls without overrides share one
 * cached result for the life of the process.
 */
export function initializeClaudeSdkBootstrap(overrides: ClaudeBootstrapOverrides = {}): ClaudeSdkBootstrap {
  if (overrides.env === undefined && cachedBootstrap) {
    return cachedBootstrap;
  }

  const env = overrides.env ?? process.env;
  const apiKey = resolveApiKey(env);
  if (!apiKey) {
    throw new ClaudeBootstrapError(
      'CLAUDE_BOOTSTRAP_MISSING_AUTH',
      'Claude model client requires an API key via CLAUDE_API_KEY or ANTHROPIC_API_KEY.',
      { checkedEnvVars: [CLAUDE_API_KEY_ENV_VAR, ANTHROPIC_API_KEY_ENV_VAR] },
    );
  }

  const bootstrap: ClaudeSdkBootstrap = Object.freeze({
    model: readConfiguredEnvValue(env, CLAUDE_MODEL_ENV_VAR) ?? DEFAULT_CLAUDE_MODEL,
    baseUrl: resolveBaseUrl(env),
    apiKey: apiKey.apiKey,
    apiKeySource: apiKey.apiKeySource,
    defaultTimeoutMs: resolveDefaultTimeout(env),
  });

  if (overrides.env === undefined) {
    cachedBootstrap = bootstrap;
  }

  return bootstrap;
}
