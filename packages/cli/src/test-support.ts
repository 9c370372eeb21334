import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createModelClientResolver } from '@flowpilot/agents';
import { createDatabase, migrateDatabase, type FlowpilotDatabase } from '@flowpilot/db';
import type { ModelCallConfig, ModelClient } from '@flowpilot/shared';
import type { CliDependencies, CliIo } from './types.js';

// Repository root, where the bundled workflows/ and prompts/ directories live.
export const repositoryRoot = resolve(dirname(fileURLToPath(import.meta.url)), '../../..');

export type CapturedIo = {
  stdout: string[];
  stderr: string[];
  io: CliIo;
};

export function createCapturedIo(
  options: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
  } = {},
): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    stdout,
    stderr,
    io: {
      stdout: message => stdout.push(message),
      stderr: message => stderr.push(message),
      cwd: options.cwd ?? repositoryRoot,
      env: options.env ?? {},
    },
  };
}

export type ScriptedModelClient = ModelClient & {
  prompts: string[];
  configs: ModelCallConfig[];
};

export function createScriptedModelClient(replies: readonly (string | Error)[]): ScriptedModelClient {
  const prompts: string[] = [];
  const configs: ModelCallConfig[] = [];
  let cursor = 0;

  return {
    name: 'scripted',
    prompts,
    configs,
    async complete(prompt, config) {
      prompts.push(prompt);
      configs.push(config);
      const reply = replies[Math.min(cursor, replies.length - 1)];
      cursor += 1;
      if (reply === undefined) {
        throw new Error('scripted model has no replies');
      }
      if (reply instanceof Error) {
        throw reply;
      }
      return reply;
    },
  };
}

export function createTestDatabase(): FlowpilotDatabase {
  const db = createDatabase(':memory:');
  migrateDatabase(db);
  return db;
}

export function createDependencies(
  db: FlowpilotDatabase,
  model: ModelClient = createScriptedModelClient(['{}']),
): CliDependencies {
  return {
    openDatabase: () => db,
    migrateDatabase: target => migrateDatabase(target),
    resolveModelClient: createModelClientResolver({ claude: model }),
  };
}
