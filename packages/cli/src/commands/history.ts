import { createSqliteRunStore } from '@flowpilot/db';
import { EXIT_NOT_FOUND, EXIT_RUNTIME_ERROR, EXIT_SUCCESS, EXIT_USAGE_ERROR, HISTORY_USAGE } from '../constants.js';
import { formatStepRecord, openInitializedDatabase } from '../execution.js';
import { toErrorMessage } from '../io.js';
import { getRequiredOption, validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleHistoryCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'history',
      usage: HISTORY_USAGE,
      allowedOptions: ['run'],
      flagOptions: ['json'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const runId = getRequiredOption(parsedOptions.options, 'run', 'run_id', HISTORY_USAGE, io);
  if (!runId) {
    return EXIT_USAGE_ERROR;
  }

  try {
    const store = createSqliteRunStore(openInitializedDatabase(dependencies, io));
    const steps = store.listSteps(runId);
    if (steps === null) {
      io.stderr(`Run "${runId}" was not found.`);
      return EXIT_NOT_FOUND;
    }

    if (parsedOptions.options.has('json')) {
      io.stdout(JSON.stringify(steps, null, 2));
      return EXIT_SUCCESS;
    }

    if (steps.length === 0) {
      io.stdout(`Run "${runId}" has no recorded steps.`);
      return EXIT_SUCCESS;
    }

    for (const step of steps) {
      io.stdout(formatStepRecord(step));
    }
    return EXIT_SUCCESS;
  } catch (error) {
    io.stderr(`Failed to read run history: ${toErrorMessage(error)}`);
    return EXIT_RUNTIME_ERROR;
  }
}
