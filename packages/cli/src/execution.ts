import { resolve } from 'node:path';
import { UnknownModelProviderError } from '@flowpilot/agents';
import {
  ConfigurationError,
  createBuiltinHandlers,
  createDecisionHandler,
  createHandlerRegistry,
  createWorkflowCatalog,
  DefinitionError,
  emptyTemplateSource,
  loadTemplateDirectory,
  resolveEngineConfig,
  type EngineConfig,
  type EngineEvent,
  type HandlerRegistry,
  type PromptTemplateSource,
  type WorkflowCatalog,
} from '@flowpilot/core';
import type { FlowpilotDatabase } from '@flowpilot/db';
import type { RunStatus, RunStatusView, StepRecord } from '@flowpilot/shared';
import {
  DEFAULT_DATABASE_FILE,
  DEFAULT_MODEL_PROVIDER,
  DEFAULT_PROMPTS_DIR,
  DEFAULT_WORKFLOWS_DIR,
  EXIT_RUNTIME_ERROR,
  EXIT_USAGE_ERROR,
} from './constants.js';
import { toErrorMessage } from './io.js';
import type { CliDependencies, CliIo, ExitCode } from './types.js';

export type CliWorkspace = {
  templates: PromptTemplateSource;
  handlers: HandlerRegistry;
  catalog: WorkflowCatalog;
  config: EngineConfig;
};

function resolveConfiguredPath(io: Pick<CliIo, 'cwd' | 'env'>, envKey: string, fallback: string): string {
  const configuredPath = io.env[envKey]?.trim();
  if (configuredPath && configuredPath.length > 0) {
    return resolve(io.cwd, configuredPath);
  }

  return resolve(io.cwd, fallback);
}

export function resolveDatabasePath(io: Pick<CliIo, 'cwd' | 'env'>): string {
  return resolveConfiguredPath(io, 'FLOWPILOT_DB_PATH', DEFAULT_DATABASE_FILE);
}

export function resolveWorkflowsDirectory(io: Pick<CliIo, 'cwd' | 'env'>): string {
  return resolveConfiguredPath(io, 'FLOWPILOT_WORKFLOWS_DIR', DEFAULT_WORKFLOWS_DIR);
}

export function resolvePromptsDirectory(io: Pick<CliIo, 'cwd' | 'env'>): string {
  return resolveConfiguredPath(io, 'FLOWPILOT_PROMPTS_DIR', DEFAULT_PROMPTS_DIR);
}

export function openInitializedDatabase(dependencies: CliDependencies, io: Pick<CliIo, 'cwd' | 'env'>): FlowpilotDatabase {
  const db = dependencies.openDatabase(resolveDatabasePath(io));
  dependencies.migrateDatabase(db);
  return db;
}

function isMissingPathError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// A missing prompts directory is an empty template source; workflows that reference templates then fail validation.
export async function loadPromptTemplates(io: Pick<CliIo, 'cwd' | 'env'>): Promise<PromptTemplateSource> {
  try {
    return await loadTemplateDirectory(resolvePromptsDirectory(io));
  } catch (error) {
    if (isMissingPathError(error)) {
      return emptyTemplateSource;
    }
    throw error;
  }
}

export function createCliHandlerRegistry(dependencies: CliDependencies, io: Pick<CliIo, 'env'>): HandlerRegistry {
  const providerName = io.env.FLOWPILOT_MODEL_PROVIDER?.trim() || DEFAULT_MODEL_PROVIDER;
  const model = dependencies.resolveModelClient(providerName);

  return createHandlerRegistry({
    ...createBuiltinHandlers(),
    decision: createDecisionHandler({ model }),
  });
}

/**
 * Loads templates, handlers, engine settings and every workflow definition the CLI can see.
 */
export async function openWorkspace(dependencies: CliDependencies, io: Pick<CliIo, 'cwd' | 'env'>): Promise<CliWorkspace> {
  const config = resolveEngineConfig(io.env);
  const templates = await loadPromptTemplates(io);
  const handlers = createCliHandlerRegistry(dependencies, io);
  const catalog = createWorkflowCatalog({ templates, handlers });
  await catalog.loadDirectory(resolveWorkflowsDirectory(io));

  return { templates, handlers, catalog, config };
}

export function mapWorkspaceError(error: unknown, io: Pick<CliIo, 'stderr'>): ExitCode {
  if (error instanceof ConfigurationError || error instanceof UnknownModelProviderError) {
    io.stderr(`Configuration error: ${error.message}`);
    return EXIT_USAGE_ERROR;
  }

  if (error instanceof DefinitionError) {
    io.stderr(`Invalid workflow definition: ${error.message}`);
    return EXIT_RUNTIME_ERROR;
  }

  io.stderr(`Failed to load workflows: ${toErrorMessage(error)}`);
  return EXIT_RUNTIME_ERROR;
}

export function shouldTreatRunStatusAsFailure(status: RunStatus): boolean {
  return status === 'failed' || status === 'cancelled';
}

export function formatRunSummary(run: RunStatusView): string {
  return `Run id=${run.runId} workflow=${run.workflowId}@${run.workflowVersion} status=${run.status} steps=${run.stepCount}`;
}

export function formatStepRecord(record: StepRecord): string {
  const prefix = `#${record.sequence} ${record.nodeId} attempt=${record.attempt} duration=${record.durationMs}ms`;
  if (record.error === null) {
    return `${prefix} ok`;
  }

  const code = record.error.code === null ? '' : ` (${record.error.code})`;
  return `${prefix} error=${record.error.kind}${code}: ${record.error.message}`;
}

export function formatEngineEvent(event: EngineEvent): string {
  const prefix = `[${event.timestamp}]`;
  switch (event.type) {
    case 'run_started':
      return `${prefix} run ${event.runId} started workflow=${event.workflowId} entry=${event.entryNode}`;
    case 'step_started':
      return `${prefix} step #${event.sequence} ${event.nodeId} started attempt=${event.attempt}`;
    case 'step_completed':
      return `${prefix} step #${event.sequence} ${event.nodeId} completed in ${event.durationMs}ms`;
    case 'step_failed':
      return `${prefix} step #${event.sequence} ${event.nodeId} failed: ${event.error.kind}: ${event.error.message}`;
    case 'step_retrying':
      return `${prefix} retrying ${event.nodeId} attempt=${event.nextAttempt}`;
    case 'transition':
      return `${prefix} ${event.from} -> ${event.to}${event.via === 'error' ? ' (error route)' : ''}`;
    case 'run_finished':
      return `${prefix} run ${event.runId} finished status=${event.status} steps=${event.stepCount}`;
  }
}

