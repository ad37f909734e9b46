import { Annotation } from '@langchain/langgraph';
import type {
  ComputationPlan,
  ConversationTurn,
  DataQuery,
  Dataset,
  ExecutionResult,
  Intent,
  ObservationVerdict,
  RetryCounters,
  RouteClass,
  SessionSnapshot,
  Strategy,
  TurnSummary,
} from '../types';
import type { AnyOutcome, Cancelled, NodeId, RouteTarget, TrailEntry, UnavailableReason } from '../types/graph';

export const ExecutionStateAnnotation = Annotation.Root({
  runId: Annotation<string>,
  sessionId: Annotation<string>,
  turnNumber: Annotation<number>,
  startedAt: Annotation<string>,

  // Conversation
  turnHistory: Annotation<ConversationTurn[]>,
  summaries: Annotation<TurnSummary[]>,

  // Understanding
  intent: Annotation<Intent | null>,
  routeClass: Annotation<RouteClass | null>,
  strategy: Annotation<Strategy | null>,

  // Data
  dataQuery: Annotation<DataQuery | null>,
  workingDataset: Annotation<Dataset | null>,

  // Computation
  computationPlan: Annotation<ComputationPlan | null>,
  executionResult: Annotation<ExecutionResult | null>,
  observationVerdict: Annotation<ObservationVerdict | null>,
  retryCounters: Annotation<RetryCounters>,

  // Response
  finalResponse: Annotation<string | null>,
  responder: Annotation<NodeId | null>,
  unavailableReason: Annotation<UnavailableReason | null>,
  summary: Annotation<string | null>,

  // Flow control
  hops: Annotation<number>,
  lastOutcome: Annotation<AnyOutcome | Cancelled | null>,
  nextNode: Annotation<RouteTarget | null>,
  cancelled: Annotation<boolean>,
  trail: Annotation<TrailEntry[]>({
    reducer: (left, right) => left.concat(right),
    default: () => [],
  }),
});

export type ExecutionState = typeof ExecutionStateAnnotation.State;

export type ExecutionPatch = Partial<ExecutionState>;

export interface InitialStateInput {
  runId: string;
  sessionId: string;
  message: string;
  snapshot: SessionSnapshot | null;
  now?: Date;
}

/**
 * Fresh per-turn state, seeded from the session's persisted summaries and
 * working dataset. Raw transcript turns are not carried into the run.
 */
export function createInitialState({ runId, sessionId, message, snapshot, now = new Date() }: InitialStateInput): ExecutionState {
  const timestamp = now.toISOString();

  return {
    runId,
    sessionId,
    turnNumber: (snapshot?.turnCount ?? 0) + 1,
    startedAt: timestamp,
    turnHistory: [{ role: 'user', content: message, timestamp }],
    summaries: snapshot?.summaries ?? [],
    intent: null,
    routeClass: null,
    strategy: null,
    dataQuery: null,
    workingDataset: snapshot?.workingDataset ?? null,
    computationPlan: null,
    executionResult: null,
    observationVerdict: null,
    retryCounters: { correction: 0, reflection: 0 },
    finalResponse: null,
    responder: null,
    unavailableReason: null,
    summary: null,
    hops: 0,
    lastOutcome: null,
    nextNode: null,
    cancelled: false,
    trail: [],
  };
}

/** Shape check for values read back from the graph or its checkpointer. */
export function isExecutionState(value: unknown): value is ExecutionState {
  if (value === null || typeof value !== 'object') return false;
  return 'runId' in value && typeof value.runId === 'string'
    && 'sessionId' in value && typeof value.sessionId === 'string'
    && 'hops' in value && typeof value.hops === 'number'
    && 'turnHistory' in value && Array.isArray(value.turnHistory)
    && 'trail' in value && Array.isArray(value.trail);
}

export function latestUserTurn(state: ExecutionState): ConversationTurn | undefined {
  for (let i = state.turnHistory.length - 1; i >= 0; i--) {
    if (state.turnHistory[i].role === 'user') return state.turnHistory[i];
  }
  return undefined;
}

/**
 * Patch fields every responding node sets: the final response, who produced
 * it, and the assistant turn appended to the history.
 */
export function respondWith(state: ExecutionState, responder: NodeId, message: string): ExecutionPatch {
  return {
    finalResponse: message,
    responder,
    turnHistory: [
      ...state.turnHistory,
      { role: 'assistant', content: message, timestamp: new Date().toISOString() },
    ],
  };
}
