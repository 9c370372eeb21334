export const EXIT_SUCCESS = 0;
export const EXIT_USAGE_ERROR = 2;
export const EXIT_NOT_FOUND = 3;
export const EXIT_RUNTIME_ERROR = 4;

export const RUN_USAGE = 'Usage: flowpilot run --workflow <workflow_id> [--input <json_object>] [--verbose]';
export const VALIDATE_USAGE = 'Usage: flowpilot validate <file...>';
export const STATUS_USAGE = 'Usage: flowpilot status --run <run_id>';
export const HISTORY_USAGE = 'Usage: flowpilot history --run <run_id> [--json]';
export const LIST_USAGE = 'Usage: flowpilot list [--runs] [--limit <count>]';

export const DEFAULT_DATABASE_FILE = 'flowpilot.db';
export const DEFAULT_WORKFLOWS_DIR = 'workflows';
export const DEFAULT_PROMPTS_DIR = 'prompts';
export const DEFAULT_MODEL_PROVIDER = 'claude';
export const DEFAULT_RUN_LIST_LIMIT = 20;
