import { compareStringsByCodeUnit, type ModelClient } from '@flowpilot/shared';
import { ClaudeModelClient } from './providers/claude.js';

export type ModelProviderName = 'claude';

export type ModelClientRegistry<TName extends string = ModelProviderName> = Readonly<Record<TName, ModelClient>>;

export type ModelClientResolver = (providerName: string) => ModelClient;

/**
 * Returns a new provider-name list sorted deterministically for error output.
 */
function sortProviderNames(providerNames: readonly string[]): string[] {
  return [...providerNames].sort(compareStringsByCodeUnit);
}

export class UnknownModelProviderError extends Error {
  readonly code = 'UNKNOWN_MODEL_PROVIDER';
  readonly providerName: string;
  readonly availableProviders: readonly string[];

  constructor(providerName: string, availableProviders: readonly string[]) {
    const sortedProviders = sortProviderNames(availableProviders);
    const providersText = sortedProviders.length > 0 ? sortedProviders.join(', ') : '(none)';
    super(`Unknown model provider "${providerName}". Available providers: ${providersText}.`);

    this.name = 'UnknownModelProviderError';
    this.providerName = providerName;
    this.availableProviders = sortedProviders;
  }
}

export function createModelClientResolver(registry: Readonly<Record<string, ModelClient>>): ModelClientResolver {
  const clients = new Map<string, ModelClient>(Object.entries(registry));
  const availableProviders = sortProviderNames([...clients.keys()]);

  return (providerName: string): ModelClient => {
    const client = clients.get(providerName);
    if (!client) {
      throw new UnknownModelProviderError(providerName, availableProviders);
    }

    return client;
  };
}

export function createDefaultModelClientRegistry(): ModelClientRegistry {
  return Object.freeze({
    claude: new ClaudeModelClient(),
  });
}

export const resolveModelClient = createModelClientResolver(createDefaultModelClientRegistry());
