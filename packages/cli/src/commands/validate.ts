import { resolve } from 'node:path';
import { DefinitionError, loadWorkflowFile, type LoadWorkflowOptions } from '@flowpilot/core';
import { EXIT_RUNTIME_ERROR, EXIT_SUCCESS, VALIDATE_USAGE } from '../constants.js';
import { createCliHandlerRegistry, loadPromptTemplates, mapWorkspaceError } from '../execution.js';
import { toErrorMessage } from '../io.js';
import { validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleValidateCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'validate',
      usage: VALIDATE_USAGE,
      allowedOptions: [],
      positionalCount: 1,
      variadicPositionals: true,
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  let loadOptions: LoadWorkflowOptions;
  try {
    loadOptions = {
      templates: await loadPromptTemplates(io),
      handlers: createCliHandlerRegistry(dependencies, io),
    };
  } catch (error) {
    return mapWorkspaceError(error, io);
  }

  let invalidCount = 0;
  for (const file of parsedOptions.positionals) {
    try {
      const workflow = await loadWorkflowFile(resolve(io.cwd, file), loadOptions);
      io.stdout(`OK ${file} (${workflow.id}@${workflow.version}, ${workflow.nodes.size} nodes)`);
    } catch (error) {
      invalidCount += 1;
      const detail = error instanceof DefinitionError ? `[${error.code}] ${error.message}` : toErrorMessage(error);
      io.stdout(`INVALID ${file}: ${detail}`);
    }
  }

  if (invalidCount > 0) {
    io.stderr(`${invalidCount} of ${parsedOptions.positionals.length} workflow files are invalid.`);
    return EXIT_RUNTIME_ERROR;
  }

  return EXIT_SUCCESS;
}

