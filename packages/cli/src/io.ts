import { EXIT_USAGE_ERROR } from './constants.js';
import type { CliIo, ExitCode } from './types.js';

export function createDefaultIo(): CliIo {
  return {
    stdout: message => console.log(message),
    stderr: message => console.error(message),
    cwd: process.cwd(),
    env: process.env,
  };
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function printGeneralUsage(io: Pick<CliIo, 'stdout'>): void {
  io.stdout('flowpilot - declarative agent workflow runner');
  io.stdout('');
  io.stdout('Usage: flowpilot <command> [options]');
  io.stdout('');
  io.stdout('Commands:');
  io.stdout('  run --workflow <id> [--input <json>] [--verbose]');
  io.stdout('                             Execute a workflow and record the run');
  io.stdout('  validate <file...>         Check workflow definition files');
  io.stdout('  status --run <run_id>      Show the status of a recorded run');
  io.stdout('  history --run <run_id> [--json]');
  io.stdout('                             Show the step history of a recorded run');
  io.stdout('  list [--runs] [--limit <count>]');
  io.stdout('                             List available workflows, or recent runs');
  io.stdout('');
  io.stdout('Environment:');
  io.stdout('  FLOWPILOT_DB_PATH          SQLite database file (default ./flowpilot.db)');
  io.stdout('  FLOWPILOT_WORKFLOWS_DIR    Workflow definitions directory (default ./workflows)');
  io.stdout('  FLOWPILOT_PROMPTS_DIR      Prompt templates directory (default ./prompts)');
  io.stdout('  FLOWPILOT_MODEL_PROVIDER   Model client for decision nodes (default claude)');
}

export function usageError(io: Pick<CliIo, 'stderr'>, message: string, usage: string): ExitCode {
  io.stderr(message);
  io.stderr(usage);
  return EXIT_USAGE_ERROR;
}
