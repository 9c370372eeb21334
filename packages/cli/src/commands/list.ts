import { createSqliteRunStore } from '@flowpilot/db';
import { DEFAULT_RUN_LIST_LIMIT, EXIT_RUNTIME_ERROR, EXIT_SUCCESS, EXIT_USAGE_ERROR, LIST_USAGE } from '../constants.js';
import { formatRunSummary, mapWorkspaceError, openInitializedDatabase, openWorkspace, type CliWorkspace } from '../execution.js';
import { toErrorMessage } from '../io.js';
import { parseStrictPositiveInteger, validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

function listRuns(limit: number, dependencies: CliDependencies, io: CliIo): ExitCode {
  try {
    const store = createSqliteRunStore(openInitializedDatabase(dependencies, io));
    const runs = store.listRuns({ limit });
    if (runs.length === 0) {
      io.stdout('No runs recorded.');
      return EXIT_SUCCESS;
    }

    for (const run of runs) {
      io.stdout(formatRunSummary(run));
    }
    return EXIT_SUCCESS;
  } catch (error) {
    io.stderr(`Failed to list runs: ${toErrorMessage(error)}`);
    return EXIT_RUNTIME_ERROR;
  }
}

export async function handleListCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'list',
      usage: LIST_USAGE,
      allowedOptions: ['limit'],
      flagOptions: ['runs'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const rawLimit = parsedOptions.options.get('limit');
  const limit = rawLimit === undefined ? DEFAULT_RUN_LIST_LIMIT : parseStrictPositiveInteger(rawLimit);
  if (limit === null) {
    io.stderr(`Invalid limit "${rawLimit}". Limit must be a positive integer.`);
    return EXIT_USAGE_ERROR;
  }

  if (parsedOptions.options.has('runs')) {
    return listRuns(limit, dependencies, io);
  }

  let workspace: CliWorkspace;
  try {
    workspace = await openWorkspace(dependencies, io);
  } catch (error) {
    return mapWorkspaceError(error, io);
  }

  const workflows = workspace.catalog.list();
  if (workflows.length === 0) {
    io.stdout('No workflows found.');
    return EXIT_SUCCESS;
  }

  for (const workflow of workflows) {
    const description = workflow.description === null ? '' : ` - ${workflow.description}`;
    io.stdout(`${workflow.id}@${workflow.version} (${workflow.nodes.size} nodes, entry ${workflow.entryNode})${description}`);
  }
  return EXIT_SUCCESS;
}
