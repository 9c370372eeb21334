import { createWorkflowRuntime, WorkflowNotFoundError } from '@flowpilot/core';
import { createSqliteRunStore } from '@flowpilot/db';
import { EXIT_NOT_FOUND, EXIT_RUNTIME_ERROR, EXIT_SUCCESS } from '../constants.js';
import {
  formatEngineEvent,
  formatRunSummary,
  mapWorkspaceError,
  openInitializedDatabase,
  openWorkspace,
  shouldTreatRunStatusAsFailure,
  type CliWorkspace,
} from '../execution.js';
import { toErrorMessage } from '../io.js';
import { parseRunCommandInput } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleRunCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedInput = parseRunCommandInput(rawArgs, io);
  if (!parsedInput.ok) {
    return parsedInput.exitCode;
  }

  let workspace: CliWorkspace;
  try {
    workspace = await openWorkspace(dependencies, io);
  } catch (error) {
    return mapWorkspaceError(error, io);
  }

  try {
    const store = createSqliteRunStore(openInitializedDatabase(dependencies, io));
    const runtime = createWorkflowRuntime({
      catalog: workspace.catalog,
      handlers: workspace.handlers,
      config: workspace.config,
      store,
      onEvent: parsedInput.verbose ? event => io.stderr(formatEngineEvent(event)) : undefined,
    });

    const runId = runtime.submit(parsedInput.workflowId, parsedInput.input);
    const snapshot = await runtime.waitForRun(runId);
    const view = runtime.status(runId);
    if (view) {
      io.stdout(`${formatRunSummary(view)}.`);
    }
    io.stdout(JSON.stringify(snapshot.context, null, 2));

    if (snapshot.failure) {
      io.stderr(`Run ${snapshot.status}: ${snapshot.failure.reason} at node "${snapshot.failure.nodeId ?? '(none)'}": ${snapshot.failure.message}`);
    }

    return shouldTreatRunStatusAsFailure(snapshot.status) ? EXIT_RUNTIME_ERROR : EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof WorkflowNotFoundError) {
      const available = workspace.catalog.list().map(workflow => workflow.id);
      io.stderr(`${error.message} Available workflows: ${available.length > 0 ? available.join(', ') : '(none)'}.`);
      return EXIT_NOT_FOUND;
    }

    io.stderr(`Run failed: ${toErrorMessage(error)}`);
    return EXIT_RUNTIME_ERROR;
  }
}
