import { ModelError } from '../../core/errors';
import { createInitialState, ExecutionPatch, ExecutionState } from '../../graph/state';
import type {
  CollectionInfo,
  ComputationPlan,
  DataQuery,
  DataResult,
  Dataset,
  ExecutionResult,
  Scalar,
  SessionSnapshot,
} from '../../types';
import type {
  DataSource,
  ModelGateway,
  ModelResult,
  OutputSchema,
  PromptContext,
  PromptName,
  PromptTemplate,
  Sandbox,
} from '../../types/collaborators';
import type { SandboxLimits } from '../../types/graph';

export type Reply = object;
export type ScriptFn = (context: PromptContext, attempt: number) => Reply;
// A list of replies is consumed in order; the last one repeats
export type Script = Reply[] | ScriptFn;

export interface ModelCall {
  prompt: PromptName;
  context: PromptContext;
}

/**
 * Model stand-in answering from per-prompt scripts. Replies go through the
 * caller's schema exactly like real model output; a ModelError reply is
 * returned as a failure. Prompts without a script fail as transport errors.
 */
export class ScriptedModel implements ModelGateway {
  readonly calls: ModelCall[] = [];
  private attempts = new Map<PromptName, number>();

  constructor(private readonly scripts: Partial<Record<PromptName, Script>> = {}) {}

  async invoke<T>(template: PromptTemplate, schema: OutputSchema<T>, context: PromptContext): Promise<ModelResult<T>> {
    this.calls.push({ prompt: template.name, context });
    const attempt = this.attempts.get(template.name) ?? 0;
    this.attempts.set(template.name, attempt + 1);

    const script = this.scripts[template.name];
    if (!script) {
      return { ok: false, error: new ModelError('transport', `No script for ${template.name}`) };
    }

    const reply = Array.isArray(script) ? script[Math.min(attempt, script.length - 1)] : script(context, attempt);
    if (reply instanceof ModelError) {
      return { ok: false, error: reply };
    }

    const parsed = schema.safeParse(reply);
    if (!parsed.success) {
      return { ok: false, error: new ModelError('invalid_output', `Scripted reply for ${template.name} is invalid`) };
    }
    return { ok: true, value: parsed.data };
  }

  promptsCalled(): PromptName[] {
    return this.calls.map(call => call.prompt);
  }

  callsTo(prompt: PromptName): ModelCall[] {
    return this.calls.filter(call => call.prompt === prompt);
  }
}

export interface InMemoryDataSourceOptions {
  queryDelayMs?: number;
  failWith?: 'connection_failed';
}

/** Data source over fixed in-process tables with equality filters. */
export class InMemoryDataSource implements DataSource {
  readonly queries: DataQuery[] = [];

  constructor(
    private readonly tables: Record<string, Record<string, Scalar>[]>,
    private readonly options: InMemoryDataSourceOptions = {}
  ) {}

  async query(query: DataQuery): Promise<DataResult> {
    this.queries.push(query);
    if (this.options.queryDelayMs) {
      await new Promise(resolve => setTimeout(resolve, this.options.queryDelayMs));
    }
    if (this.options.failWith) {
      return { ok: false, error: { kind: this.options.failWith, message: 'store offline' } };
    }

    const table = this.tables[query.collection];
    if (!table) {
      return { ok: false, error: { kind: 'not_found', message: `No collection ${query.collection}` } };
    }

    const rows = table
      .filter(row => Object.entries(query.filter).every(([key, value]) => row[key] === value))
      .slice(0, query.limit ?? table.length);
    return { ok: true, dataset: makeDataset(rows, query) };
  }

  async describe(): Promise<CollectionInfo[]> {
    return Object.entries(this.tables).map(([name, rows]) => ({ name, fields: Object.keys(rows[0] ?? {}) }));
  }
}

/** Sandbox returning queued results; the last one repeats. */
export class ScriptedSandbox implements Sandbox {
  readonly runs: ComputationPlan[] = [];

  constructor(private readonly results: ExecutionResult[]) {}

  async run(plan: ComputationPlan, _dataset: Dataset | null, _limits: SandboxLimits): Promise<ExecutionResult> {
    this.runs.push(plan);
    return this.results[Math.min(this.runs.length - 1, this.results.length - 1)];
  }
}

export const ORDERS: Record<string, Scalar>[] = [
  { region: 'north', amount: 120, quarter: 'Q1' },
  { region: 'south', amount: 80, quarter: 'Q1' },
  { region: 'north', amount: 200, quarter: 'Q2' },
  { region: 'south', amount: 100, quarter: 'Q2' },
];

export function makeDataset(rows: Record<string, Scalar>[], query: DataQuery | null = null): Dataset {
  return {
    columns: Object.keys(rows[0] ?? {}),
    rows,
    query,
    retrievedAt: '2024-01-01T00:00:00.000Z',
  };
}

export function snapshotWithOrders(sessionId: string): SessionSnapshot {
  return {
    sessionId,
    turnCount: 1,
    summaries: [{ turn: 1, summary: 'Loaded the orders table.', dataQuery: null, createdAt: '2024-01-01T00:00:00.000Z' }],
    turns: [],
    workingDataset: makeDataset(ORDERS, { collection: 'orders', filter: {} }),
    updatedAt: '2024-01-01T00:00:00.000Z',
  };
}

export function stateWith(patch: ExecutionPatch = {}, snapshot: SessionSnapshot | null = null): ExecutionState {
  const base = createInitialState({
    runId: 'run-test',
    sessionId: 'session-test',
    message: 'What is total revenue?',
    snapshot,
    now: new Date('2024-01-01T00:00:00.000Z'),
  });
  return { ...base, ...patch };
}

// Reply builders for the structured outputs

export const intentReply = (question: string, relevantTurns: number[] = []): Reply => ({
  question,
  relevantTurns,
  rationale: 'restated',
});

export const routeReply = (route: 'analytical' | 'conversational' | 'out_of_domain'): Reply => ({
  route,
  rationale: 'classified',
});

export const orchestrationReply = (
  decision: 'data_sufficient' | 'need_retrieval' | 'ready_to_compute' | 'data_unavailable',
  query: DataQuery | null = null
): Reply => ({ decision, query, rationale: 'decided' });

export const planReply = (...steps: Array<[output: string, code: string]>): Reply => ({
  analysisType: 'descriptive',
  steps: steps.map(([output, code], index) => ({
    number: index + 1,
    description: `Compute ${output}`,
    input: index === 0 ? 'dataset' : steps[index - 1][0],
    output,
    code,
    rationale: 'needed for the answer',
  })),
  rationale: 'plan',
});

export const observationReply = (status: 'sufficient' | 'insufficient'): Reply => ({ status, rationale: 'checked' });

export const messageReply = (message: string): Reply => ({ message });

export const summaryReply = (summary: string): Reply => ({ summary });

export function successResult(value: number): ExecutionResult {
  return { status: 'success', output: { value, outputs: { result: value }, logs: [] } };
}

export function errorResult(kind: string, message: string, stepIndex: number | null = 1): ExecutionResult {
  return { status: 'error', error: { kind, message, stepIndex } };
}
