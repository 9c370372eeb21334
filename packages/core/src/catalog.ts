import { compareStringsByCodeUnit, type WorkflowDefinition } from '@flowpilot/shared';
import { WorkflowNotFoundError } from './errors.js';
import { loadWorkflowDefinition, loadWorkflowDirectory, type LoadWorkflowOptions } from './workflowLoader.js';

export type WorkflowCatalog = {
  register(document: unknown): WorkflowDefinition;
  registerDefinition(definition: WorkflowDefinition): WorkflowDefinition;
  loadDirectory(directory: string): Promise<WorkflowDefinition[]>;
  get(workflowId: string): WorkflowDefinition | undefined;
  require(workflowId: string): WorkflowDefinition;
  list(): WorkflowDefinition[];
};

/**
 * Holds validated definitions by id. A definition is published only after it fully validates;
 * re-registering an id replaces it for new runs while runs already started keep theirs.
 */
export function createWorkflowCatalog(options: LoadWorkflowOptions = {}): WorkflowCatalog {
  const definitions = new Map<string, WorkflowDefinition>();

  const registerDefinition = (definition: WorkflowDefinition) => {
    definitions.set(definition.id, definition);
    return definition;
  };

  return {
    register: document => registerDefinition(loadWorkflowDefinition(document, options)),
    registerDefinition,
    async loadDirectory(directory) {
      // All files validate before any of them is published.
      const loaded = await loadWorkflowDirectory(directory, options);
      return loaded.map(registerDefinition);
    },
    get: workflowId => definitions.get(workflowId),
    require(workflowId) {
      const definition = definitions.get(workflowId);
      if (!definition) {
        throw new WorkflowNotFoundError(workflowId);
      }
      return definition;
    },
    list: () => [...definitions.values()].sort((a, b) => compareStringsByCodeUnit(a.id, b.id)),
  };
}
