/**
 * Table-driven routing between graph nodes.
 *
 * The topology lives in ROUTE_TABLE, not in node bodies, so it can be audited
 * and tested on its own. `Router.resolve` is a pure function of
 * (node, outcome, routing view); the same recorded trail always resolves to
 * the same successor sequence.
 */
import { TopologyError } from '../core/errors';
import type { RetryCounters, RetryKind } from '../types';
import {
  CANCELLED,
  ENTRY_NODE,
  NODE_IDS,
  NODE_OUTCOMES,
  TERMINAL,
  isNodeId,
  type AnyOutcome,
  type Cancelled,
  type NodeId,
  type RouteTable,
  type RouteTarget,
  type TrailEntry,
  type UnavailableReason,
} from '../types/graph';

export const ROUTE_TABLE: RouteTable = {
  intent_comprehension: {
    intent_resolved: 'request_classification',
  },
  request_classification: {
    analytical: 'analysis_orchestration',
    conversational: 'direct_response',
    out_of_domain: 'punt_response',
  },
  analysis_orchestration: {
    data_sufficient: 'computation_planning',
    ready_to_compute: 'computation_planning',
    need_retrieval: 'data_retrieval',
    data_unavailable: 'data_unavailability',
  },
  data_retrieval: {
    retrieval_ok: 'computation_planning',
    retrieval_empty: 'data_unavailability',
    retrieval_failed: 'data_unavailability',
  },
  computation_planning: {
    plan_ready: 'sandbox_environment',
    plan_failed: 'data_unavailability',
  },
  sandbox_environment: {
    exec_success: 'observation',
    exec_error: 'self_correction',
  },
  observation: {
    sufficient: 'analysis_response',
    insufficient: 'self_reflection',
  },
  self_correction: {
    plan_ready: 'sandbox_environment',
    retry_exhausted: 'data_unavailability',
    plan_failed: 'data_unavailability',
  },
  self_reflection: {
    plan_ready: 'sandbox_environment',
    retry_exhausted: 'data_unavailability',
    plan_failed: 'data_unavailability',
  },
  analysis_response: { responded: 'summarization' },
  direct_response: { responded: 'summarization' },
  data_unavailability: { responded: 'summarization' },
  punt_response: { responded: TERMINAL },
  summarization: { persisted: TERMINAL },
};

// Where every forced detour lands
export const FALLBACK_NODE: NodeId = 'data_unavailability';

const RETRY_NODES: Partial<Record<NodeId, RetryKind>> = {
  self_correction: 'correction',
  self_reflection: 'reflection',
};

export interface RoutingLimits {
  maxCorrections: number;
  maxReflections: number;
  maxHops: number;
}

/** The slice of ExecutionState the router is allowed to see. */
export interface RoutingView {
  hops: number;
  retryCounters: RetryCounters;
  finalResponse: string | null;
}

function lookup(table: RouteTable, node: NodeId, outcome: string): RouteTarget | undefined {
  const entries: Record<string, RouteTarget> = table[node];
  return Object.prototype.hasOwnProperty.call(entries, outcome) ? entries[outcome] : undefined;
}

/**
 * Checks a route table before any run starts. Throws TopologyError when a
 * node is missing, an outcome is missing or unknown, a successor does not
 * exist, a node cannot be reached from the entry node, or no path reaches
 * TERMINAL.
 */
export function validateRouteTable(table: RouteTable): void {
  for (const node of NODE_IDS) {
    const entries: Record<string, string> | undefined = table[node];
    if (!entries) {
      throw new TopologyError(`Route table has no entry for node "${node}"`, { node });
    }

    const declared: readonly string[] = NODE_OUTCOMES[node];
    for (const outcome of declared) {
      if (!Object.prototype.hasOwnProperty.call(entries, outcome)) {
        throw new TopologyError(`Route table is missing ${node}.${outcome}`, { node, outcome });
      }
    }

    for (const [outcome, target] of Object.entries(entries)) {
      if (!declared.includes(outcome)) {
        throw new TopologyError(`Route table names unknown outcome ${node}.${outcome}`, { node, outcome });
      }
      if (target !== TERMINAL && !isNodeId(target)) {
        throw new TopologyError(`Route ${node}.${outcome} points at unknown node "${target}"`, {
          node,
          outcome,
          target,
        });
      }
    }
  }

  const reached = new Set<RouteTarget>([ENTRY_NODE]);
  const queue: NodeId[] = [ENTRY_NODE];
  while (queue.length > 0) {
    const node = queue.shift();
    if (!node) break;
    for (const target of Object.values<RouteTarget>(table[node])) {
      if (reached.has(target)) continue;
      reached.add(target);
      if (target !== TERMINAL) queue.push(target);
    }
  }

  const unreachable = NODE_IDS.filter(node => !reached.has(node));
  if (unreachable.length > 0) {
    throw new TopologyError(`Nodes unreachable from ${ENTRY_NODE}: ${unreachable.join(', ')}`, { unreachable });
  }
  if (!reached.has(TERMINAL)) {
    throw new TopologyError('No route reaches TERMINAL');
  }
}

export class Router {
  constructor(
    private readonly limits: RoutingLimits,
    private readonly table: RouteTable = ROUTE_TABLE
  ) {
    validateRouteTable(table);
  }

  knows(node: NodeId, outcome: string): outcome is AnyOutcome {
    return lookup(this.table, node, outcome) !== undefined;
  }

  /** Every target a node can hand over to, including forced detours. */
  successors(node: NodeId): RouteTarget[] {
    const targets = new Set<RouteTarget>(Object.values<RouteTarget>(this.table[node]));
    targets.add(FALLBACK_NODE);
    targets.add(TERMINAL);
    return [...targets];
  }

  resolve(node: NodeId, outcome: AnyOutcome | Cancelled, view: RoutingView): RouteTarget {
    if (outcome === CANCELLED) return TERMINAL;

    const next = lookup(this.table, node, outcome);
    if (next === undefined) {
      throw new TopologyError(`No route for outcome "${outcome}" of node "${node}"`, { node, outcome });
    }

    if (view.hops >= this.limits.maxHops) {
      return view.finalResponse ? TERMINAL : FALLBACK_NODE;
    }

    if (next !== TERMINAL && this.retryExhausted(next, view.retryCounters)) {
      return FALLBACK_NODE;
    }

    return next;
  }

  /**
   * Why a decision that lands on the fallback node was taken. Null when the
   * decision does not end at data_unavailability.
   */
  explain(node: NodeId, outcome: AnyOutcome | Cancelled, view: RoutingView): UnavailableReason | null {
    if (outcome === CANCELLED) return null;
    if (this.resolve(node, outcome, view) !== FALLBACK_NODE) return null;

    const planned = lookup(this.table, node, outcome);
    if (planned !== FALLBACK_NODE) {
      if (view.hops >= this.limits.maxHops) return 'hop_limit';
      if (planned === 'self_correction') return 'correction_exhausted';
      if (planned === 'self_reflection') return 'reflection_exhausted';
    }

    switch (outcome) {
      case 'retrieval_empty':
        return 'retrieval_empty';
      case 'retrieval_failed':
        return 'retrieval_failed';
      case 'plan_failed':
        return 'planning_failed';
      case 'retry_exhausted':
        return node === 'self_reflection' ? 'reflection_exhausted' : 'correction_exhausted';
      default:
        return 'no_source_data';
    }
  }

  maxAttempts(kind: RetryKind): number {
    return kind === 'correction' ? this.limits.maxCorrections : this.limits.maxReflections;
  }

  private retryExhausted(target: NodeId, counters: RetryCounters): boolean {
    const kind = RETRY_NODES[target];
    if (!kind) return false;
    return counters[kind] >= this.maxAttempts(kind);
  }
}

/**
 * Re-resolves a recorded trail. Router purity means the result equals the
 * `next` column of the trail.
 */
export function replayRoutes(router: Router, trail: TrailEntry[]): RouteTarget[] {
  return trail.map(entry =>
    router.resolve(entry.node, entry.outcome, {
      hops: entry.hop,
      retryCounters: entry.counters,
      finalResponse: entry.responded ? 'responded' : null,
    })
  );
}
