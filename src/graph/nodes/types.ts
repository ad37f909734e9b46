import type { ExecutionPatch, ExecutionState } from '../state';
import type { Collaborators } from '../../types/collaborators';
import type { GraphLimits, NodeId, NodeOutcome } from '../../types/graph';

export interface NodeDependencies extends Collaborators {
  limits: GraphLimits;
}

export interface NodeResult<N extends NodeId> {
  outcome: NodeOutcome<N>;
  patch: ExecutionPatch;
}

/**
 * A node body: reads state, calls at most its own collaborators, and reports
 * an outcome. Routing is never decided here.
 */
export type GraphNode<N extends NodeId> = (state: ExecutionState, deps: NodeDependencies) => Promise<NodeResult<N>>;

export type NodeRegistry = { [N in NodeId]: GraphNode<N> };
