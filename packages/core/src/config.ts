import { ConfigurationError } from './errors.js';

export const retryScopes = ['node', 'run'] as const;
export type RetryScope = (typeof retryScopes)[number];

export type EngineConfig = {
  maxSteps: number;
  // null disables the limit.
  stepTimeoutMs: number | null;
  runTimeoutMs: number | null;
  // 'node' counts attempts per node within a run, 'run' shares one count across all nodes of the run.
  retryScope: RetryScope;
};

export const defaultEngineConfig: Readonly<EngineConfig> = Object.freeze({
  maxSteps: 50,
  stepTimeoutMs: 120_000,
  runTimeoutMs: 900_000,
  retryScope: 'node',
});

export const engineConfigEnv = {
  maxSteps: 'FLOWPILOT_MAX_STEPS',
  stepTimeoutMs: 'FLOWPILOT_STEP_TIMEOUT_MS',
  runTimeoutMs: 'FLOWPILOT_RUN_TIMEOUT_MS',
  retryScope: 'FLOWPILOT_RETRY_SCOPE',
} as const;

function parsePositiveInteger(key: string, rawValue: string): number {
  const trimmed = rawValue.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < 1) {
    throw new ConfigurationError(key, `${key} must be a positive integer, got "${rawValue}".`);
  }
  return Number(trimmed);
}

// "none" or "off" disables a timeout.
function parseTimeout(key: string, rawValue: string): number | null {
  const normalized = rawValue.trim().toLowerCase();
  if (normalized === 'none' || normalized === 'off') {
    return null;
  }
  return parsePositiveInteger(key, rawValue);
}

function parseRetryScope(key: string, rawValue: string): RetryScope {
  const normalized = rawValue.trim().toLowerCase();
  const scope = retryScopes.find(candidate => candidate === normalized);
  if (!scope) {
    throw new ConfigurationError(key, `${key} must be one of ${retryScopes.join(', ')}, got "${rawValue}".`);
  }
  return scope;
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

function assertConfig(config: EngineConfig): EngineConfig {
  if (!Number.isInteger(config.maxSteps) || config.maxSteps < 1) {
    throw new ConfigurationError('maxSteps', `maxSteps must be a positive integer, got ${config.maxSteps}.`);
  }

  for (const key of ['stepTimeoutMs', 'runTimeoutMs'] as const) {
    const value = config[key];
    if (value !== null && (!Number.isFinite(value) || value <= 0)) {
      throw new ConfigurationError(key, `${key} must be a positive number or null, got ${value}.`);
    }
  }

  return config;
}

/**
 * Layers explicit overrides over environment variables over defaults.
 */
export function resolveEngineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  const config: EngineConfig = { ...defaultEngineConfig };

  const maxSteps = readEnv(env, engineConfigEnv.maxSteps);
  if (maxSteps !== undefined) {
    config.maxSteps = parsePositiveInteger(engineConfigEnv.maxSteps, maxSteps);
  }

  const stepTimeout = readEnv(env, engineConfigEnv.stepTimeoutMs);
  if (stepTimeout !== undefined) {
    config.stepTimeoutMs = parseTimeout(engineConfigEnv.stepTimeoutMs, stepTimeout);
  }

  const runTimeout = readEnv(env, engineConfigEnv.runTimeoutMs);
  if (runTimeout !== undefined) {
    config.runTimeoutMs = parseTimeout(engineConfigEnv.runTimeoutMs, runTimeout);
  }

  const retryScope = readEnv(env, engineConfigEnv.retryScope);
  if (retryScope !== undefined) {
    config.retryScope = parseRetryScope(engineConfigEnv.retryScope, retryScope);
  }

  return assertConfig({
    maxSteps: overrides.maxSteps ?? config.maxSteps,
    stepTimeoutMs: overrides.stepTimeoutMs !== undefined ? overrides.stepTimeoutMs : config.stepTimeoutMs,
    runTimeoutMs: overrides.runTimeoutMs !== undefined ? overrides.runTimeoutMs : config.runTimeoutMs,
    retryScope: overrides.retryScope ?? config.retryScope,
  });
}
