import type { DataErrorKind } from '../core/errors';

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
  timestamp: string;
}

export interface TurnSummary {
  turn: number;
  summary: string;
  dataQuery: DataQuery | null;
  createdAt: string;
}

export interface SessionSnapshot {
  sessionId: string;
  turnCount: number;
  summaries: TurnSummary[];
  turns: ConversationTurn[];
  workingDataset: Dataset | null;
  updatedAt: string;
}

export type Scalar = string | number | boolean | null;

export type JsonValue = Scalar | JsonValue[] | { [key: string]: JsonValue };

export interface DataQuery {
  collection: string;
  filter: Record<string, unknown>;
  fields?: string[];
  limit?: number;
}

export interface Dataset {
  columns: string[];
  rows: Record<string, Scalar>[];
  query: DataQuery | null;
  retrievedAt: string;
}

export interface CollectionInfo {
  name: string;
  fields: string[];
}

export type DataResult =
  | { ok: true; dataset: Dataset }
  | { ok: false; error: { kind: DataErrorKind; message: string } };

export type RouteClass = 'analytical' | 'conversational' | 'out_of_domain';

export type Strategy = 'use_existing_data' | 'retrieve_external_data' | 'compute_now';

export interface Intent {
  question: string;
  relevantTurns: number[];
  rationale: string;
}

export type AnalysisType = 'descriptive' | 'diagnostic' | 'predictive' | 'inferential';

export interface PlanStep {
  number: number;
  description: string;
  input: string | null;
  output: string;
  code: string;
  rationale: string;
}

export interface ComputationPlan {
  analysisType: AnalysisType;
  steps: PlanStep[];
  rationale: string;
}

export interface SandboxOutput {
  value: JsonValue;
  outputs: Record<string, JsonValue>;
  logs: string[];
}

export interface SandboxFault {
  kind: string;
  message: string;
  // 1-based step number; null when the fault is not tied to a step
  stepIndex: number | null;
}

export type ExecutionResult =
  | { status: 'success'; output: SandboxOutput }
  | { status: 'error'; error: SandboxFault };

export interface ObservationVerdict {
  status: 'sufficient' | 'insufficient';
  rationale: string;
}

export interface RetryCounters {
  correction: number;
  reflection: number;
}

export type RetryKind = keyof RetryCounters;
