import { createSqliteRunStore } from '@flowpilot/db';
import { EXIT_NOT_FOUND, EXIT_RUNTIME_ERROR, EXIT_SUCCESS, EXIT_USAGE_ERROR, STATUS_USAGE } from '../constants.js';
import { formatRunSummary, openInitializedDatabase } from '../execution.js';
import { toErrorMessage } from '../io.js';
import { getRequiredOption, validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleStatusCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'status',
      usage: STATUS_USAGE,
      allowedOptions: ['run'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const runId = getRequiredOption(parsedOptions.options, 'run', 'run_id', STATUS_USAGE, io);
  if (!runId) {
    return EXIT_USAGE_ERROR;
  }

  try {
    const store = createSqliteRunStore(openInitializedDatabase(dependencies, io));
    const run = store.getRun(runId);
    if (!run) {
      io.stderr(`Run "${runId}" was not found.`);
      return EXIT_NOT_FOUND;
    }

    io.stdout(`${formatRunSummary(run)}.`);
    io.stdout(`Current node: ${run.currentNode}`);
    io.stdout(`Started at: ${run.startedAt}`);
    io.stdout(`Completed at: ${run.completedAt ?? '-'}`);
    if (run.failure) {
      io.stdout(`Failure: ${run.failure.reason} at node "${run.failure.nodeId ?? '(none)'}": ${run.failure.message}`);
    }
    return EXIT_SUCCESS;
  } catch (error) {
    io.stderr(`Failed to read run status: ${toErrorMessage(error)}`);
    return EXIT_RUNTIME_ERROR;
  }
}
