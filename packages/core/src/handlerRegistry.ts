import {
  compareStringsByCodeUnit,
  type HandlerKind,
  type HandlerOutput,
  type RunContext,
  type WorkflowNode,
} from '@flowpilot/shared';
import { UnknownHandlerError } from './errors.js';

export type HandlerRequest = {
  node: WorkflowNode;
  context: Readonly<RunContext>;
  // Rendered prompt when the node declares a template, otherwise null.
  prompt: string | null;
  attempt: number;
  signal: AbortSignal;
};

export interface NodeHandler {
  readonly kind: HandlerKind;
  invoke(request: HandlerRequest): Promise<HandlerOutput> | HandlerOutput;
}

export type HandlerMap<TName extends string = string> = Readonly<Record<TName, NodeHandler>>;

export type HandlerRegistry = {
  resolve(name: string): NodeHandler | undefined;
  require(name: string): NodeHandler;
  has(name: string): boolean;
  names(): string[];
};

export function defineDeterministicHandler(
  invoke: (request: HandlerRequest) => Promise<HandlerOutput> | HandlerOutput,
): NodeHandler {
  return Object.freeze({ kind: 'deterministic' as const, invoke });
}

/**
 * Freezes a name-to-handler map into a registry. Registration happens once, here;
 * the registry is read-only afterwards and safe to share between runs.
 */
export function createHandlerRegistry(handlers: HandlerMap): HandlerRegistry {
  const entries = new Map<string, NodeHandler>(Object.entries(handlers));
  const availableHandlers = [...entries.keys()].sort(compareStringsByCodeUnit);

  return Object.freeze({
    resolve: (name: string) => entries.get(name),
    require: (name: string) => {
      const handler = entries.get(name);
      if (!handler) {
        throw new UnknownHandlerError(name, availableHandlers);
      }
      return handler;
    },
    has: (name: string) => entries.has(name),
    names: () => [...availableHandlers],
  });
}
