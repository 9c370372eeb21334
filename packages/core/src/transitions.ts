import type { HandlerOutput, RunContext, WorkflowDefinition, WorkflowEdge } from '@flowpilot/shared';
import { evaluateGuard } from './guards.js';
import { getOutgoingEdges } from './workflow.js';

export type TransitionResult = {
  edge: WorkflowEdge;
  targetNode: string;
} | null;

/**
 * Picks the first outgoing edge of `nodeId` whose condition holds against the step output
 * and the already-merged context. A default edge always matches. Null means no edge applies.
 */
export function selectNextNode(
  workflow: WorkflowDefinition,
  nodeId: string,
  output: Readonly<HandlerOutput>,
  context: Readonly<RunContext>,
): TransitionResult {
  for (const edge of getOutgoingEdges(workflow, nodeId)) {
    if (edge.isDefault) {
      return { edge, targetNode: edge.target };
    }

    if (edge.condition && evaluateGuard(edge.condition, { output, context })) {
      return { edge, targetNode: edge.target };
    }
  }

  return null;
}
