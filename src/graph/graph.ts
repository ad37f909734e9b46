// src/graph/graph.ts
import { randomUUID } from 'crypto';
import { END, START, StateGraph } from '@langchain/langgraph';
import { config } from '../core/config';
import { createLogger } from '../core/logger';
import { TopologyError, ValidationError, errorMessage } from '../core/errors';
import { RESPONSE_TEMPLATES } from '../prompts/templates';
import type { SessionSnapshot } from '../types';
import type { Collaborators } from '../types/collaborators';
import {
  CANCELLED,
  ENTRY_NODE,
  NODE_IDS,
  TERMINAL,
  type AnyOutcome,
  type Cancelled,
  type CheckpointEvent,
  type GraphLimits,
  type NodeId,
  type RouteTable,
  type RunObserver,
  type TrailEntry,
  type UnavailableReason,
} from '../types/graph';
import { RunCheckpointer } from './checkpointer';
import { NODE_REGISTRY, type NodeDependencies, type NodeRegistry } from './nodes';
import { FALLBACK_NODE, ROUTE_TABLE, Router, type RoutingView } from './router';
import {
  ExecutionPatch,
  ExecutionState,
  ExecutionStateAnnotation,
  createInitialState,
  isExecutionState,
} from './state';
import { withCollaboratorTimeouts } from './timed-collaborators';

const log = createLogger('executor');

// Extra supersteps LangGraph may take past the hop ceiling before it aborts the run itself
const RECURSION_HEADROOM = 5;

export const DEFAULT_LIMITS: GraphLimits = {
  maxCorrections: config.graph.maxCorrections,
  maxReflections: config.graph.maxReflections,
  maxHops: config.graph.maxHops,
  sandbox: { timeoutMs: config.sandbox.timeoutMs, memoryLimitMb: config.sandbox.memoryLimitMb },
  modelTimeoutMs: config.execution.llmTimeout,
  dataTimeoutMs: config.execution.dbTimeout,
};

export interface AnalysisExecutorOptions {
  collaborators: Collaborators;
  limits?: Partial<GraphLimits>;
  routes?: RouteTable;
  nodes?: Partial<NodeRegistry>;
  checkpointer?: RunCheckpointer;
  /** Finished runs whose checkpoints are kept; older ones are forgotten. */
  retainedRuns?: number;
}

export interface RunRequest {
  sessionId: string;
  message: string;
  runId?: string;
  observer?: RunObserver;
  signal?: AbortSignal;
}

export type RunStatus = 'completed' | 'cancelled' | 'failed';

export interface RunResult {
  runId: string;
  status: RunStatus;
  finalResponse: string | null;
  responder: NodeId | null;
  unavailableReason: UnavailableReason | null;
  trail: TrailEntry[];
  state: ExecutionState;
  durationMs: number;
}

interface RunScope {
  observer?: RunObserver;
  signal?: AbortSignal;
}

type WrappedNode = (state: ExecutionState) => Promise<ExecutionPatch>;

function followNextNode(state: ExecutionState): NodeId | typeof END {
  return state.nextNode === null || state.nextNode === TERMINAL ? END : state.nextNode;
}

function compileGraph(wrap: (node: NodeId) => WrappedNode, router: Router, checkpointer: RunCheckpointer) {
  const workflow = new StateGraph(ExecutionStateAnnotation)
    .addNode('intent_comprehension', wrap('intent_comprehension'))
    .addNode('request_classification', wrap('request_classification'))
    .addNode('analysis_orchestration', wrap('analysis_orchestration'))
    .addNode('data_retrieval', wrap('data_retrieval'))
    .addNode('data_unavailability', wrap('data_unavailability'))
    .addNode('computation_planning', wrap('computation_planning'))
    .addNode('sandbox_environment', wrap('sandbox_environment'))
    .addNode('observation', wrap('observation'))
    .addNode('self_correction', wrap('self_correction'))
    .addNode('self_reflection', wrap('self_reflection'))
    .addNode('analysis_response', wrap('analysis_response'))
    .addNode('direct_response', wrap('direct_response'))
    .addNode('punt_response', wrap('punt_response'))
    .addNode('summarization', wrap('summarization'))
    .addEdge(START, ENTRY_NODE);

  // The wrapper has already resolved the successor; edges only follow it
  for (const node of NODE_IDS) {
    const destinations = router.successors(node).map(target => (target === TERMINAL ? END : target));
    workflow.addConditionalEdges(node, followNextNode, destinations);
  }

  return workflow.compile({ checkpointer });
}

/**
 * Drives one analysis turn through the node graph. Nodes report outcomes,
 * the router picks successors, and every transition is checkpointed under
 * the run id before the next node starts.
 */
export class AnalysisExecutor {
  readonly router: Router;
  readonly limits: GraphLimits;
  private readonly collaborators: Collaborators;
  private readonly nodes: NodeRegistry;
  private readonly deps: NodeDependencies;
  private readonly graph: ReturnType<typeof compileGraph>;
  private readonly scopes = new Map<string, RunScope>();
  private readonly checkpointer: RunCheckpointer;
  private readonly retainedRuns: number;
  private readonly finished: string[] = [];

  constructor(options: AnalysisExecutorOptions) {
    this.limits = {
      ...DEFAULT_LIMITS,
      ...options.limits,
      sandbox: { ...DEFAULT_LIMITS.sandbox, ...options.limits?.sandbox },
    };

    // Throws TopologyError before any run when the table is inconsistent
    this.router = new Router(this.limits, options.routes ?? ROUTE_TABLE);

    this.collaborators = withCollaboratorTimeouts(options.collaborators, this.limits);
    this.nodes = { ...NODE_REGISTRY, ...options.nodes };
    this.deps = { ...this.collaborators, limits: this.limits };
    this.checkpointer = options.checkpointer ?? new RunCheckpointer();
    this.retainedRuns = options.retainedRuns ?? config.graph.retainedRuns;
    this.graph = compileGraph(node => this.wrap(node), this.router, this.checkpointer);
  }

  async run(request: RunRequest): Promise<RunResult> {
    const { sessionId, message, observer, signal } = request;
    if (!sessionId || !sessionId.trim()) {
      throw new ValidationError('sessionId is required');
    }
    if (!message || !message.trim()) {
      throw new ValidationError('message must not be empty');
    }

    const runId = request.runId ?? randomUUID();
    if (this.scopes.has(runId)) {
      throw new ValidationError(`Run ${runId} is already in progress`, { runId });
    }
    // A run id names exactly one turn
    if (this.checkpointer.has(runId)) {
      throw new ValidationError(`Run ${runId} has already finished`, { runId });
    }

    this.scopes.set(runId, { observer, signal });

    const startTime = Date.now();
    let snapshot: SessionSnapshot | null = null;
    try {
      snapshot = await this.collaborators.memory.loadSummary(sessionId);
    } catch (error) {
      log.warn('Could not load session memory, starting empty', { sessionId, error: errorMessage(error) });
    }

    const initialState = createInitialState({ runId, sessionId, message, snapshot });

    log.info('Starting analysis run', { runId, sessionId, turn: initialState.turnNumber });

    try {
      const output: unknown = await this.graph.invoke(initialState, {
        configurable: { thread_id: runId },
        recursionLimit: this.limits.maxHops + RECURSION_HEADROOM,
      });

      if (!isExecutionState(output)) {
        throw new Error('Graph returned a value that is not an execution state');
      }

      const status: RunStatus = output.cancelled ? 'cancelled' : 'completed';
      log.info('Analysis run finished', {
        runId,
        status,
        hops: output.hops,
        responder: output.responder,
        durationMs: Date.now() - startTime,
      });

      return this.toResult(output, status, startTime);
    } catch (error) {
      if (error instanceof TopologyError) throw error;

      log.error('Analysis run failed', {
        runId,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });

      const latest = (await this.latestCheckpoint(runId)) ?? initialState;
      return {
        ...this.toResult(latest, 'failed', startTime),
        finalResponse: RESPONSE_TEMPLATES.INTERNAL_ERROR(),
      };
    } finally {
      this.scopes.delete(runId);
      this.retire(runId);
    }
  }

  private retire(runId: string): void {
    this.finished.push(runId);
    while (this.finished.length > this.retainedRuns) {
      const evicted = this.finished.shift();
      if (evicted === undefined) break;
      this.checkpointer.forget(evicted);
      log.debug('Checkpoints of finished run dropped', { runId: evicted });
    }
  }

  /** Last checkpointed state of a run, or null when the run id is unknown. */
  async getCheckpoint(runId: string): Promise<ExecutionState | null> {
    const snapshot = await this.graph.getState({ configurable: { thread_id: runId } });
    const values: unknown = snapshot.values;
    return isExecutionState(values) && values.runId === runId ? values : null;
  }

  private async latestCheckpoint(runId: string): Promise<ExecutionState | null> {
    try {
      return await this.getCheckpoint(runId);
    } catch (error) {
      log.warn('Could not read checkpoint of failed run', { runId, error: errorMessage(error) });
      return null;
    }
  }

  private toResult(state: ExecutionState, status: RunStatus, startTime: number): RunResult {
    return {
      runId: state.runId,
      status,
      finalResponse: state.finalResponse,
      responder: state.responder,
      unavailableReason: state.unavailableReason,
      trail: state.trail,
      state,
      durationMs: Date.now() - startTime,
    };
  }

  private wrap<N extends NodeId>(node: N): WrappedNode {
    return async (state: ExecutionState): Promise<ExecutionPatch> => {
      const scope = this.scopes.get(state.runId);
      const hops = state.hops + 1;

      if (scope?.signal?.aborted) {
        log.info('Run cancelled at node boundary', { runId: state.runId, node });
        return this.transition(state, node, CANCELLED, { cancelled: true }, hops, scope);
      }

      const body = this.nodes[node];
      const startedAt = Date.now();
      const { outcome, patch } = await body(state, this.deps);

      if (!this.router.knows(node, outcome)) {
        throw new TopologyError(`Node "${node}" reported unknown outcome "${outcome}"`, { node, outcome });
      }

      log.debug('Node completed', { runId: state.runId, node, outcome, durationMs: Date.now() - startedAt });
      return this.transition(state, node, outcome, patch, hops, scope);
    };
  }

  private async transition(
    state: ExecutionState,
    node: NodeId,
    outcome: AnyOutcome | Cancelled,
    patch: ExecutionPatch,
    hops: number,
    scope: RunScope | undefined
  ): Promise<ExecutionPatch> {
    const view = { ...state, ...patch };
    const routing: RoutingView = {
      hops,
      retryCounters: view.retryCounters,
      finalResponse: view.finalResponse,
    };

    const next = this.router.resolve(node, outcome, routing);
    const reason = next === FALLBACK_NODE ? this.router.explain(node, outcome, routing) : null;
    const at = new Date().toISOString();

    const entry: TrailEntry = {
      node,
      outcome,
      next,
      hop: hops,
      counters: { ...view.retryCounters },
      responded: view.finalResponse !== null,
      at,
    };

    if (reason) {
      log.info('Routing to data unavailability', { runId: state.runId, node, outcome, reason });
    }

    if (scope?.observer) {
      await this.notify(scope.observer, { runId: state.runId, node, outcome, next, hop: hops, timestamp: at });
    }

    return {
      ...patch,
      ...(reason ? { unavailableReason: reason } : {}),
      hops,
      lastOutcome: outcome,
      nextNode: next,
      trail: [entry],
    };
  }

  private async notify(observer: RunObserver, event: CheckpointEvent): Promise<void> {
    try {
      await observer.onCheckpoint(event);
    } catch (error) {
      log.warn('Run observer failed', { runId: event.runId, node: event.node, error: errorMessage(error) });
    }
  }
}
