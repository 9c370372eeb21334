import { EXIT_USAGE_ERROR, RUN_USAGE } from './constants.js';
import { usageError } from './io.js';
import type {
  CliIo,
  CommandValidationConfig,
  ParsedLongOptionToken,
  ParsedOptions,
  ParsedRunCommandInput,
  ValidatedCommandOptions,
} from './types.js';

function parseLongOptionToken(arg: string, flagOptions: ReadonlySet<string>): ParsedLongOptionToken {
  if (!arg.startsWith('--')) {
    return { kind: 'positional', value: arg };
  }

  const equalsIndex = arg.indexOf('=');
  const optionName = equalsIndex >= 0 ? arg.slice(2, equalsIndex) : arg.slice(2);
  if (optionName.length === 0) {
    return { kind: 'error', message: 'Option name cannot be empty.' };
  }

  if (equalsIndex < 0) {
    return flagOptions.has(optionName) ? { kind: 'flag', optionName } : { kind: 'option-next', optionName };
  }

  const optionValue = arg.slice(equalsIndex + 1);
  if (optionValue.length === 0) {
    return { kind: 'error', message: `Option "--${optionName}" requires a value.` };
  }
  return { kind: 'option-inline', optionName, optionValue };
}

function parseLongOptions(
  args: readonly string[],
  parseOptions: { flagOptions?: readonly string[] } = {},
): ParsedOptions {
  const flagOptions = new Set(parseOptions.flagOptions ?? []);
  const resolvedOptions = new Map<string, string>();
  const positionals: string[] = [];

  let cursor = 0;
  while (cursor < args.length) {
    const parsedToken = parseLongOptionToken(args[cursor], flagOptions);
    if (parsedToken.kind === 'error') {
      return { ok: false, message: parsedToken.message };
    }

    if (parsedToken.kind === 'positional') {
      positionals.push(parsedToken.value);
      cursor += 1;
      continue;
    }

    const { optionName } = parsedToken;
    if (resolvedOptions.has(optionName)) {
      return { ok: false, message: `Option "--${optionName}" cannot be provided more than once.` };
    }

    if (parsedToken.kind === 'option-inline') {
      resolvedOptions.set(optionName, parsedToken.optionValue);
      cursor += 1;
      continue;
    }

    if (parsedToken.kind === 'flag') {
      resolvedOptions.set(optionName, 'true');
      cursor += 1;
      continue;
    }

    const optionValue = args[cursor + 1];
    if (!optionValue || optionValue.startsWith('--')) {
      return { ok: false, message: `Option "--${optionName}" requires a value.` };
    }

    resolvedOptions.set(optionName, optionValue);
    cursor += 2;
  }

  return { ok: true, options: resolvedOptions, positionals };
}

export function validateCommandOptions(
  rawArgs: readonly string[],
  config: CommandValidationConfig,
  io: Pick<CliIo, 'stderr'>,
): ValidatedCommandOptions {
  const parsedOptions = parseLongOptions(rawArgs, { flagOptions: config.flagOptions });
  if (!parsedOptions.ok) {
    return { ok: false, exitCode: usageError(io, parsedOptions.message, config.usage) };
  }

  const { options, positionals } = parsedOptions;
  const expectedPositionals = config.positionalCount ?? 0;
  let problem: string | null = null;
  if (!config.variadicPositionals && positionals.length > expectedPositionals) {
    problem = `Unexpected positional arguments for "${config.commandName}": ${positionals.join(' ')}`;
  } else if (positionals.length < expectedPositionals) {
    problem = `Missing required positional argument for "${config.commandName}".`;
  } else {
    const allowedOptions = new Set([...config.allowedOptions, ...(config.flagOptions ?? [])]);
    const unknown = [...options.keys()].find(optionName => !allowedOptions.has(optionName));
    if (unknown !== undefined) {
      problem = `Unknown option for "${config.commandName}": --${unknown}`;
    }
  }

  if (problem !== null) {
    return { ok: false, exitCode: usageError(io, problem, config.usage) };
  }

  return { ok: true, options, positionals };
}

export function getRequiredOption(
  options: ReadonlyMap<string, string>,
  optionName: string,
  optionDescription: string,
  usage: string,
  io: Pick<CliIo, 'stderr'>,
): string | null {
  const value = options.get(optionName)?.trim();
  if (value) {
    return value;
  }

  usageError(io, `Missing required option: --${optionName} <${optionDescription}>`, usage);
  return null;
}

export function parseStrictPositiveInteger(value: string): number | null {
  if (!/^[1-9]\d*$/.test(value)) {
    return null;
  }

  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    return null;
  }

  return parsed;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Parses run input given on the command line. Single-quoted JSON such as `{'query': 'x'}` is
 * accepted by retrying with every single quote replaced by a double quote.
 */
export function parseRunInput(text: string): { ok: true; value: Record<string, unknown> } | { ok: false; message: string } {
  let parsed = tryParseJson(text);
  if (!parsed.ok) {
    const requoted = tryParseJson(text.replaceAll("'", '"'));
    if (!requoted.ok) {
      return { ok: false, message: `Invalid JSON input: ${parsed.message}` };
    }
    parsed = requoted;
  }

  if (!isJsonObject(parsed.value)) {
    return { ok: false, message: 'Run input must be a JSON object.' };
  }

  return { ok: true, value: parsed.value };
}

export function parseRunCommandInput(rawArgs: readonly string[], io: Pick<CliIo, 'stderr'>): ParsedRunCommandInput {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'run',
      usage: RUN_USAGE,
      allowedOptions: ['workflow', 'input'],
      flagOptions: ['verbose'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return { ok: false, exitCode: parsedOptions.exitCode };
  }

  const workflowId = getRequiredOption(parsedOptions.options, 'workflow', 'workflow_id', RUN_USAGE, io);
  if (!workflowId) {
    return { ok: false, exitCode: EXIT_USAGE_ERROR };
  }

  let input: Record<string, unknown> = {};
  const rawInput = parsedOptions.options.get('input');
  if (rawInput !== undefined) {
    const parsedInput = parseRunInput(rawInput);
    if (!parsedInput.ok) {
      return { ok: false, exitCode: usageError(io, parsedInput.message, RUN_USAGE) };
    }
    input = parsedInput.value;
  }

  return {
    ok: true,
    workflowId,
    input,
    verbose: parsedOptions.options.has('verbose'),
  };
}
