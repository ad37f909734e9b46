import type { RetryCounters } from '.';

export const NODE_OUTCOMES = {
  intent_comprehension: ['intent_resolved'],
  request_classification: ['analytical', 'conversational', 'out_of_domain'],
  analysis_orchestration: ['data_sufficient', 'need_retrieval', 'ready_to_compute', 'data_unavailable'],
  data_retrieval: ['retrieval_ok', 'retrieval_empty', 'retrieval_failed'],
  data_unavailability: ['responded'],
  computation_planning: ['plan_ready', 'plan_failed'],
  sandbox_environment: ['exec_success', 'exec_error'],
  observation: ['sufficient', 'insufficient'],
  self_correction: ['plan_ready', 'retry_exhausted', 'plan_failed'],
  self_reflection: ['plan_ready', 'retry_exhausted', 'plan_failed'],
  analysis_response: ['responded'],
  direct_response: ['responded'],
  punt_response: ['responded'],
  summarization: ['persisted'],
} as const;

export type NodeId = keyof typeof NODE_OUTCOMES;

export type NodeOutcome<N extends NodeId> = (typeof NODE_OUTCOMES)[N][number];

export type AnyOutcome = NodeOutcome<NodeId>;

export const NODE_IDS: readonly NodeId[] = [
  'intent_comprehension',
  'request_classification',
  'analysis_orchestration',
  'data_retrieval',
  'data_unavailability',
  'computation_planning',
  'sandbox_environment',
  'observation',
  'self_correction',
  'self_reflection',
  'analysis_response',
  'direct_response',
  'punt_response',
  'summarization',
];

export const ENTRY_NODE: NodeId = 'intent_comprehension';

export const TERMINAL = 'TERMINAL';
export type Terminal = typeof TERMINAL;

// Recorded at a node boundary when the run was cancelled before the node body ran
export const CANCELLED = 'cancelled';
export type Cancelled = typeof CANCELLED;

export type RouteTarget = NodeId | Terminal;

export type RouteTable = {
  [N in NodeId]: Record<NodeOutcome<N>, RouteTarget>;
};

export type UnavailableReason =
  | 'no_source_data'
  | 'retrieval_empty'
  | 'retrieval_failed'
  | 'planning_failed'
  | 'correction_exhausted'
  | 'reflection_exhausted'
  | 'hop_limit';

export interface TrailEntry {
  node: NodeId;
  outcome: AnyOutcome | Cancelled;
  next: RouteTarget;
  hop: number;
  counters: RetryCounters;
  responded: boolean;
  at: string;
}

export interface CheckpointEvent {
  runId: string;
  node: NodeId;
  outcome: AnyOutcome | Cancelled;
  next: RouteTarget;
  hop: number;
  timestamp: string;
}

/**
 * Called once per hop, when the node has finished and its successor is
 * known. The hop's checkpoint is written after the callback returns, so
 * `getCheckpoint` read from inside it still shows the previous hop.
 */
export interface RunObserver {
  onCheckpoint(event: CheckpointEvent): void | Promise<void>;
}

export interface GraphLimits {
  maxCorrections: number;
  maxReflections: number;
  maxHops: number;
  sandbox: SandboxLimits;
  modelTimeoutMs: number;
  dataTimeoutMs: number;
}

export interface SandboxLimits {
  timeoutMs: number;
  memoryLimitMb: number;
}

export function isNodeId(value: string): value is NodeId {
  return Object.prototype.hasOwnProperty.call(NODE_OUTCOMES, value);
}
