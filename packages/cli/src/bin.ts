#!/usr/bin/env node

import { isExecutedAsScript, runCliEntrypoint } from './entrypoint.js';

export { main, runCliEntrypoint, isExecutedAsScript } from './entrypoint.js';
export type { CliDependencies } from './types.js';

if (isExecutedAsScript(process.argv[1], import.meta.url)) {
  await runCliEntrypoint();
}
