import type { WorkflowDefinition, WorkflowEdge, WorkflowNode } from '@flowpilot/shared';

const noEdges: readonly WorkflowEdge[] = Object.freeze([]);

export function getNode(workflow: WorkflowDefinition, nodeId: string): WorkflowNode | undefined {
  return workflow.nodes.get(nodeId);
}

export function getEntryNode(workflow: WorkflowDefinition): WorkflowNode | undefined {
  return workflow.nodes.get(workflow.entryNode);
}

// Outgoing edges in declaration order, which is also their priority order.
export function getOutgoingEdges(workflow: WorkflowDefinition, nodeId: string): readonly WorkflowEdge[] {
  return workflow.edges.get(nodeId) ?? noEdges;
}

export function listNodeIds(workflow: WorkflowDefinition): string[] {
  return [...workflow.nodes.keys()];
}
