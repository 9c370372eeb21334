export { ClaudeModelClient } from './providers/claude.js';
export type { ClaudeBootstrapper, ClaudeModelClientOptions, ClaudeSdkQuery } from './providers/claude.js';
export {
  ClaudeBootstrapError,
  DEFAULT_CLAUDE_MODEL,
  initializeClaudeSdkBootstrap,
  resetClaudeSdkBootstrapCache,
} from './providers/claudeSdkBootstrap.js';
export type { ClaudeBootstrapErrorCode, ClaudeSdkBootstrap } from './providers/claudeSdkBootstrap.js';
export type { ModelClientRegistry, ModelClientResolver, ModelProviderName } from './registry.js';
export {
  UnknownModelProviderError,
  createDefaultModelClientRegistry,
  createModelClientResolver,
  resolveModelClient,
} from './registry.js';
