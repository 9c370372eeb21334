import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { FailurePolicy, WorkflowDefinition, WorkflowEdge, WorkflowNode } from '@flowpilot/shared';
import { parseCondition } from './conditions.js';
import {
  formatSchemaIssues,
  workflowDocumentSchema,
  type WorkflowEdgeDocument,
  type WorkflowNodeDocument,
} from './definitionSchema.js';
import { DefinitionError, toErrorMessage } from './errors.js';
import type { HandlerRegistry } from './handlerRegistry.js';
import { emptyTemplateSource, type PromptTemplateSource } from './templateSource.js';

export type LoadWorkflowOptions = {
  templates?: PromptTemplateSource;
  // When supplied, handler names are checked at load time instead of at run time.
  handlers?: Pick<HandlerRegistry, 'has'>;
};

export const WORKFLOW_FILE_EXTENSIONS: readonly string[] = ['.yaml', '.yml', '.json'];

function resolveFailurePolicy(workflowId: string, node: WorkflowNodeDocument): FailurePolicy {
  const fallbackTarget = node.errorTarget ?? null;

  switch (node.onError) {
    case 'retry':
      if (node.maxRetries === undefined) {
        throw new DefinitionError(
          'RETRY_WITHOUT_LIMIT',
          `Node "${node.id}" retries on error but declares no maxRetries.`,
          { workflowId, nodeId: node.id },
        );
      }
      return { retry: true, fallbackTarget };
    case 'route':
      if (fallbackTarget === null) {
        throw new DefinitionError(
          'INVALID_ERROR_TARGET',
          `Node "${node.id}" routes errors but declares no errorTarget.`,
          { workflowId, nodeId: node.id },
        );
      }
      return { retry: false, fallbackTarget };
    case 'fail':
      if (fallbackTarget !== null) {
        throw new DefinitionError(
          'INVALID_ERROR_TARGET',
          `Node "${node.id}" fails on error and cannot declare errorTarget "${fallbackTarget}".`,
          { workflowId, nodeId: node.id },
        );
      }
      return { retry: false, fallbackTarget: null };
    case undefined:
      return { retry: node.maxRetries !== undefined, fallbackTarget };
  }
}

// Map view without mutators; definitions are shared across runs.
class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  readonly #entries: Map<K, V>;

  constructor(entries: Iterable<readonly [K, V]>) {
    this.#entries = new Map(entries);
    Object.freeze(this);
  }

  get size() {
    return this.#entries.size;
  }

  get(key: K) {
    return this.#entries.get(key);
  }

  has(key: K) {
    return this.#entries.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown) {
    for (const [key, value] of this.#entries) {
      callback.call(thisArg, value, key, this);
    }
  }

  entries() {
    return this.#entries.entries();
  }

  keys() {
    return this.#entries.keys();
  }

  values() {
    return this.#entries.values();
  }

  [Symbol.iterator]() {
    return this.#entries[Symbol.iterator]();
  }
}

function buildNode(
  workflowId: string,
  node: WorkflowNodeDocument,
  options: LoadWorkflowOptions,
): WorkflowNode {
  const handler = node.handler ?? null;
  if (handler === null && !node.terminal) {
    throw new DefinitionError('MISSING_HANDLER', `Node "${node.id}" is not terminal and names no handler.`, {
      workflowId,
      nodeId: node.id,
    });
  }

  if (handler !== null && options.handlers && !options.handlers.has(handler)) {
    throw new DefinitionError('UNKNOWN_HANDLER', `Node "${node.id}" names unregistered handler "${handler}".`, {
      workflowId,
      nodeId: node.id,
    });
  }

  let promptTemplate: string | null = null;
  if (node.prompt !== undefined) {
    const templates = options.templates ?? emptyTemplateSource;
    promptTemplate = templates.resolve(node.prompt) ?? null;
    if (promptTemplate === null) {
      throw new DefinitionError(
        'MISSING_TEMPLATE',
        `Node "${node.id}" references prompt template "${node.prompt}", which does not exist.`,
        { workflowId, nodeId: node.id },
      );
    }
  }

  return Object.freeze({
    id: node.id,
    handler,
    promptTemplateRef: node.prompt ?? null,
    promptTemplate,
    terminal: node.terminal,
    config: Object.freeze({ ...node.config }),
    maxRetries: node.maxRetries ?? null,
    failurePolicy: Object.freeze(resolveFailurePolicy(workflowId, node)),
    output: Object.freeze({
      key: node.outputKey ?? null,
      fields: node.outputFields ? Object.freeze([...node.outputFields]) : null,
    }),
    failOnDeadEnd: node.failOnDeadEnd,
  });
}

function buildEdge(workflowId: string, edge: WorkflowEdgeDocument, edgeIndex: number): WorkflowEdge {
  if (edge.default) {
    if (edge.when !== undefined) {
      throw new DefinitionError(
        'INVALID_CONDITION',
        `Edge ${edgeIndex} (${edge.from} -> ${edge.to}) is a default edge and cannot declare a condition.`,
        { workflowId, nodeId: edge.from, edgeIndex },
      );
    }
    return Object.freeze({ source: edge.from, target: edge.to, condition: null, conditionSource: null, isDefault: true });
  }

  if (edge.when === undefined) {
    throw new DefinitionError(
      'EDGE_WITHOUT_CONDITION',
      `Edge ${edgeIndex} (${edge.from} -> ${edge.to}) has no condition and is not marked default.`,
      { workflowId, nodeId: edge.from, edgeIndex },
    );
  }

  if (typeof edge.when !== 'string') {
    return Object.freeze({ source: edge.from, target: edge.to, condition: edge.when, conditionSource: null, isDefault: false });
  }

  try {
    return Object.freeze({
      source: edge.from,
      target: edge.to,
      condition: parseCondition(edge.when),
      conditionSource: edge.when,
      isDefault: false,
    });
  } catch (error) {
    throw new DefinitionError('INVALID_CONDITION', `Edge ${edgeIndex} (${edge.from} -> ${edge.to}): ${toErrorMessage(error)}`, {
      workflowId,
      nodeId: edge.from,
      edgeIndex,
      cause: error,
    });
  }
}

/**
 * Validates a raw workflow document and builds an immutable definition.
 * The first violation found is raised as a DefinitionError; nothing partial is returned.
 */
export function loadWorkflowDefinition(document: unknown, options: LoadWorkflowOptions = {}): WorkflowDefinition {
  const parsed = workflowDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new DefinitionError('INVALID_DOCUMENT', `Invalid workflow document: ${formatSchemaIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }

  const raw = parsed.data;
  const workflowId = raw.id;

  const nodes = new Map<string, WorkflowNode>();
  for (const node of raw.nodes) {
    if (nodes.has(node.id)) {
      throw new DefinitionError('DUPLICATE_NODE', `Node "${node.id}" is declared more than once.`, {
        workflowId,
        nodeId: node.id,
      });
    }
    nodes.set(node.id, buildNode(workflowId, node, options));
  }

  if (!nodes.has(raw.entry)) {
    throw new DefinitionError('MISSING_ENTRY_NODE', `Entry node "${raw.entry}" is not declared.`, { workflowId });
  }

  for (const node of nodes.values()) {
    const target = node.failurePolicy.fallbackTarget;
    if (target !== null && !nodes.has(target)) {
      throw new DefinitionError(
        'INVALID_ERROR_TARGET',
        `Node "${node.id}" routes errors to unknown node "${target}".`,
        { workflowId, nodeId: node.id },
      );
    }
  }

  const edges = new Map<string, WorkflowEdge[]>();
  raw.edges.forEach((edgeDocument, edgeIndex) => {
    for (const endpoint of [edgeDocument.from, edgeDocument.to]) {
      if (!nodes.has(endpoint)) {
        throw new DefinitionError(
          'DANGLING_EDGE',
          `Edge ${edgeIndex} (${edgeDocument.from} -> ${edgeDocument.to}) references unknown node "${endpoint}".`,
          { workflowId, nodeId: edgeDocument.from, edgeIndex },
        );
      }
    }

    const edge = buildEdge(workflowId, edgeDocument, edgeIndex);
    const outgoing = edges.get(edge.source);
    if (outgoing) {
      const previous = outgoing[outgoing.length - 1];
      if (previous.isDefault) {
        throw new DefinitionError(
          'DEFAULT_EDGE_NOT_LAST',
          `Node "${edge.source}" declares an edge after its default edge.`,
          { workflowId, nodeId: edge.source, edgeIndex },
        );
      }
      outgoing.push(edge);
    } else {
      edges.set(edge.source, [edge]);
    }
  });

  for (const node of nodes.values()) {
    if (!node.terminal && !edges.has(node.id)) {
      throw new DefinitionError(
        'NON_TERMINAL_WITHOUT_EDGES',
        `Node "${node.id}" is not terminal and has no outgoing edges.`,
        { workflowId, nodeId: node.id },
      );
    }
  }

  const frozenEdges = new Map<string, readonly WorkflowEdge[]>();
  for (const [source, outgoing] of edges) {
    frozenEdges.set(source, Object.freeze([...outgoing]));
  }

  return Object.freeze({
    id: workflowId,
    version: raw.version,
    description: raw.description ?? null,
    entryNode: raw.entry,
    nodes: new FrozenMap(nodes),
    edges: new FrozenMap(frozenEdges),
  });
}

/**
 * Parses YAML (a JSON document is valid YAML) into a raw workflow document.
 */
export function parseWorkflowDocument(text: string, sourceName = '<inline>'): unknown {
  try {
    return parseYaml(text);
  } catch (error) {
    throw new DefinitionError('INVALID_DOCUMENT', `Could not parse ${sourceName}: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
}

export function loadWorkflowText(text: string, options: LoadWorkflowOptions = {}, sourceName?: string): WorkflowDefinition {
  return loadWorkflowDefinition(parseWorkflowDocument(text, sourceName), options);
}

export async function loadWorkflowFile(path: string, options: LoadWorkflowOptions = {}): Promise<WorkflowDefinition> {
  const text = await readFile(path, 'utf8');
  return loadWorkflowText(text, options, basename(path));
}

export async function loadWorkflowDirectory(
  directory: string,
  options: LoadWorkflowOptions = {},
): Promise<WorkflowDefinition[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files = entries
    .filter(entry => entry.isFile() && WORKFLOW_FILE_EXTENSIONS.includes(extname(entry.name)))
    .map(entry => entry.name)
    .sort();

  const definitions: WorkflowDefinition[] = [];
  for (const file of files) {
    definitions.push(await loadWorkflowFile(join(directory, file), options));
  }
  return definitions;
}
