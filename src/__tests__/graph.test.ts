import { TopologyError, ValidationError } from '../core/errors';
import { AnalysisExecutor } from '../graph/graph';
import type { NodeRegistry } from '../graph/nodes';
import { ROUTE_TABLE, replayRoutes } from '../graph/router';
import { RESPONSE_TEMPLATES } from '../prompts/templates';
import { WorkerSandbox } from '../sandbox/worker-sandbox';
import { InMemoryMemoryStore } from '../services/memory.service';
import type { PromptName, Sandbox } from '../types/collaborators';
import type { CheckpointEvent, GraphLimits, RouteTable, TrailEntry } from '../types/graph';
import {
  errorResult,
  InMemoryDataSource,
  intentReply,
  messageReply,
  observationReply,
  orchestrationReply,
  ORDERS,
  planReply,
  routeReply,
  ScriptedModel,
  ScriptedSandbox,
  Script,
  snapshotWithOrders,
  successResult,
  summaryReply,
} from './support/fakes';

interface HarnessOptions {
  sandbox?: Sandbox;
  data?: InMemoryDataSource;
  limits?: Partial<GraphLimits>;
  nodes?: Partial<NodeRegistry>;
  routes?: RouteTable;
  seedSession?: string;
  retainedRuns?: number;
}

function harness(scripts: Partial<Record<PromptName, Script>>, options: HarnessOptions = {}) {
  const model = new ScriptedModel(scripts);
  const data = options.data ?? new InMemoryDataSource({ orders: ORDERS });
  const memory = new InMemoryMemoryStore();
  const sandbox = options.sandbox ?? new ScriptedSandbox([successResult(500)]);
  if (options.seedSession) {
    memory.seed(snapshotWithOrders(options.seedSession));
  }

  const executor = new AnalysisExecutor({
    collaborators: { model, data, memory, sandbox },
    limits: options.limits,
    nodes: options.nodes,
    routes: options.routes,
    retainedRuns: options.retainedRuns,
  });
  return { executor, model, data, memory, sandbox };
}

const nodesOf = (trail: TrailEntry[]) => trail.map(entry => entry.node);

// Scripts for a question answered from the session's existing dataset
const analyticalScripts = (overrides: Partial<Record<PromptName, Script>> = {}): Partial<Record<PromptName, Script>> => ({
  intent_comprehension: [intentReply('What is total revenue?', [1])],
  request_classification: [routeReply('analytical')],
  analysis_orchestration: [orchestrationReply('data_sufficient')],
  computation_planning: [planReply(['total', "const total = sum(dataset, 'amount');"])],
  observation: [observationReply('sufficient')],
  analysis_response: [messageReply('Total revenue is 500.')],
  summarization: [summaryReply('Total revenue was computed as 500.')],
  ...overrides,
});

describe('AnalysisExecutor', () => {
  test('should build the default graph', () => {
    const executor = new AnalysisExecutor({
      collaborators: {
        model: new ScriptedModel(),
        data: new InMemoryDataSource({}),
        memory: new InMemoryMemoryStore(),
        sandbox: new ScriptedSandbox([]),
      },
    });

    expect(executor.router.successors('observation')).toEqual(['analysis_response', 'self_reflection', 'data_unavailability', 'TERMINAL']);
  });

  test('should report unavailability when retrieval finds nothing and there is no dataset', async () => {
    const { executor, model } = harness(
      analyticalScripts({
        analysis_orchestration: [orchestrationReply('need_retrieval', { collection: 'orders', filter: { quarter: 'Q9' } })],
        summarization: [summaryReply('No orders matched.')],
      })
    );

    const result = await executor.run({ sessionId: 'session-empty', message: 'What is revenue for Q9?' });

    expect(nodesOf(result.trail)).toEqual([
      'intent_comprehension',
      'request_classification',
      'analysis_orchestration',
      'data_retrieval',
      'data_unavailability',
      'summarization',
    ]);
    expect(result.trail[3]).toMatchObject({ outcome: 'retrieval_empty', next: 'data_unavailability' });
    expect(result.unavailableReason).toBe('retrieval_empty');
    expect(result.finalResponse).toBe(RESPONSE_TEMPLATES.UNAVAILABLE('retrieval_empty'));
    expect(result.state.workingDataset).toBeNull();
    expect(model.callsTo('computation_planning')).toEqual([]);
  });

  test('should retrieve data, compute and answer a first analytical question', async () => {
    const { executor, data, memory, model } = harness(
      {
        ...analyticalScripts(),
        intent_comprehension: [intentReply('What is total revenue?')],
        analysis_orchestration: [orchestrationReply('need_retrieval', { collection: 'orders', filter: {} })],
      },
      { sandbox: new WorkerSandbox() }
    );

    const result = await executor.run({ sessionId: 'session-a', message: 'What is total revenue?', runId: 'run-a' });

    expect(result.status).toBe('completed');
    expect(result.finalResponse).toBe('Total revenue is 500.');
    expect(result.responder).toBe('analysis_response');
    expect(result.unavailableReason).toBeNull();
    expect(nodesOf(result.trail)).toEqual([
      'intent_comprehension',
      'request_classification',
      'analysis_orchestration',
      'data_retrieval',
      'computation_planning',
      'sandbox_environment',
      'observation',
      'analysis_response',
      'summarization',
    ]);
    expect(result.trail.map(entry => entry.hop)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(result.trail[8].next).toBe('TERMINAL');
    expect(result.state.executionResult).toEqual({
      status: 'success',
      output: { value: 500, outputs: { total: 500 }, logs: [] },
    });
    expect(data.queries).toEqual([{ collection: 'orders', filter: {} }]);
    expect(model.promptsCalled()).not.toContain('self_correction');

    const saved = await memory.loadSummary('session-a');
    expect(saved?.turnCount).toBe(1);
    expect(saved?.summaries.map(s => s.summary)).toEqual(['Total revenue was computed as 500.']);
    expect(saved?.workingDataset?.rows).toHaveLength(4);
    expect(saved?.turns.map(t => t.role)).toEqual(['user', 'assistant']);
  });

  test('should reuse the working dataset on a follow-up turn', async () => {
    const { executor, data, memory } = harness(analyticalScripts(), { seedSession: 'session-b' });

    const result = await executor.run({ sessionId: 'session-b', message: 'And the total again?' });

    expect(result.status).toBe('completed');
    expect(nodesOf(result.trail)).toEqual([
      'intent_comprehension',
      'request_classification',
      'analysis_orchestration',
      'computation_planning',
      'sandbox_environment',
      'observation',
      'analysis_response',
      'summarization',
    ]);
    expect(result.state.turnNumber).toBe(2);
    expect(result.state.intent?.relevantTurns).toEqual([1]);
    expect(result.state.strategy).toBe('use_existing_data');
    expect(data.queries).toEqual([]);

    const saved = await memory.loadSummary('session-b');
    expect(saved?.turnCount).toBe(2);
    expect(saved?.summaries.map(s => s.turn)).toEqual([1, 2]);
  });

  test('should correct a plan that fails at run time', async () => {
    const { executor, model } = harness(
      analyticalScripts({
        computation_planning: [
          planReply(
            ['total', "const total = sum(dataset, 'amount');"],
            ['share', 'const share = divide(total, 0);'],
            ['rounded', 'const rounded = round(share);']
          ),
        ],
        self_correction: [
          planReply(['total', "const total = sum(dataset, 'amount');"], ['share', 'const share = divide(total, 4);']),
        ],
      }),
      { sandbox: new WorkerSandbox(), seedSession: 'session-c' }
    );

    const result = await executor.run({ sessionId: 'session-c', message: 'What is a quarter of revenue?' });

    expect(result.status).toBe('completed');
    expect(nodesOf(result.trail)).toEqual([
      'intent_comprehension',
      'request_classification',
      'analysis_orchestration',
      'computation_planning',
      'sandbox_environment',
      'self_correction',
      'sandbox_environment',
      'observation',
      'analysis_response',
      'summarization',
    ]);
    expect(result.trail[4].outcome).toBe('exec_error');
    expect(result.state.retryCounters).toEqual({ correction: 1, reflection: 0 });
    expect(result.state.executionResult?.status === 'success' && result.state.executionResult.output.value).toBe(125);

    const [correction] = model.callsTo('self_correction');
    const errorSection = correction.context.sections.find(section => section.title === 'The sandbox error');
    expect(errorSection?.body).toBe('RangeError: division by zero (step 2)');
  });

  test('should report unavailability once corrections are exhausted', async () => {
    const sandbox = new ScriptedSandbox([errorResult('Error', 'boom')]);
    const { executor } = harness(
      analyticalScripts({ self_correction: [planReply(['total', 'const total = 1;'])] }),
      { sandbox, seedSession: 'session-d', limits: { maxCorrections: 2 } }
    );

    const result = await executor.run({ sessionId: 'session-d', message: 'What is total revenue?' });

    expect(sandbox.runs).toHaveLength(3);
    expect(result.status).toBe('completed');
    expect(result.unavailableReason).toBe('correction_exhausted');
    expect(result.responder).toBe('data_unavailability');
    expect(result.finalResponse).toBe(RESPONSE_TEMPLATES.UNAVAILABLE('correction_exhausted', 'Last error: boom'));
    expect(result.state.retryCounters.correction).toBe(2);
    expect(nodesOf(result.trail).slice(-3)).toEqual(['sandbox_environment', 'data_unavailability', 'summarization']);
  });

  test('should report unavailability once reflections are exhausted', async () => {
    const sandbox = new ScriptedSandbox([successResult(42)]);
    const { executor } = harness(
      analyticalScripts({
        observation: [observationReply('insufficient')],
        self_reflection: [planReply(['total', "const total = sum(dataset, 'amount');"])],
        data_unavailability: [messageReply('The result could not be confirmed.')],
      }),
      { sandbox, seedSession: 'session-e', limits: { maxReflections: 1 } }
    );

    const result = await executor.run({ sessionId: 'session-e', message: 'What is total revenue?' });

    expect(sandbox.runs).toHaveLength(2);
    expect(result.unavailableReason).toBe('reflection_exhausted');
    expect(result.finalResponse).toBe('The result could not be confirmed.');
    expect(result.state.retryCounters).toEqual({ correction: 0, reflection: 1 });
  });

  test('should punt out-of-domain requests without touching memory', async () => {
    const { executor, memory, sandbox } = harness({
      intent_comprehension: [intentReply('Write me a poem')],
      request_classification: [routeReply('out_of_domain')],
    });

    const result = await executor.run({ sessionId: 'session-f', message: 'Write me a poem' });

    expect(nodesOf(result.trail)).toEqual(['intent_comprehension', 'request_classification', 'punt_response']);
    expect(result.finalResponse).toBe(RESPONSE_TEMPLATES.PUNT());
    expect(result.responder).toBe('punt_response');
    expect(await memory.loadSummary('session-f')).toBeNull();
    expect(sandbox instanceof ScriptedSandbox && sandbox.runs).toEqual([]);
  });

  test('should answer conversational requests directly', async () => {
    const { executor, memory } = harness({
      intent_comprehension: [intentReply('Hello')],
      request_classification: [routeReply('conversational')],
      direct_response: [messageReply('Hello! Ask me about your data.')],
      summarization: [summaryReply('Greeted the user.')],
    });

    const result = await executor.run({ sessionId: 'session-g', message: 'Hello' });

    expect(nodesOf(result.trail)).toEqual([
      'intent_comprehension',
      'request_classification',
      'direct_response',
      'summarization',
    ]);
    expect(result.finalResponse).toBe('Hello! Ask me about your data.');
    expect((await memory.loadSummary('session-g'))?.summaries.map(s => s.summary)).toEqual(['Greeted the user.']);
  });

  test('should still answer when the model is unreachable', async () => {
    const { executor } = harness({});

    const result = await executor.run({ sessionId: 'session-h', message: 'What is total revenue?' });

    expect(result.status).toBe('completed');
    expect(result.state.intent?.question).toBe('What is total revenue?');
    expect(result.finalResponse).toBe(RESPONSE_TEMPLATES.PUNT());
  });

  test('should treat a slow database as a failed retrieval', async () => {
    const { executor } = harness(
      analyticalScripts({
        analysis_orchestration: [orchestrationReply('need_retrieval', { collection: 'orders', filter: {} })],
      }),
      { data: new InMemoryDataSource({ orders: ORDERS }, { queryDelayMs: 200 }), limits: { dataTimeoutMs: 50 } }
    );

    const result = await executor.run({ sessionId: 'session-i', message: 'What is total revenue?' });

    expect(result.unavailableReason).toBe('retrieval_failed');
    expect(result.trail[3]).toMatchObject({ node: 'data_retrieval', outcome: 'retrieval_failed', next: 'data_unavailability' });
    expect(result.finalResponse).toBe(RESPONSE_TEMPLATES.UNAVAILABLE('retrieval_failed'));
  });

  test('should stop at the hop ceiling', async () => {
    const { executor } = harness(
      analyticalScripts({ self_correction: [planReply(['total', 'const total = 1;'])] }),
      {
        sandbox: new ScriptedSandbox([errorResult('Error', 'boom')]),
        seedSession: 'session-j',
        limits: { maxHops: 6, maxCorrections: 10 },
      }
    );

    const result = await executor.run({ sessionId: 'session-j', message: 'What is total revenue?' });

    expect(result.state.hops).toBe(7);
    expect(result.unavailableReason).toBe('hop_limit');
    expect(result.trail[5]).toMatchObject({ node: 'self_correction', outcome: 'plan_ready', next: 'data_unavailability' });
    expect(result.trail[6]).toMatchObject({ node: 'data_unavailability', next: 'TERMINAL' });
    expect(result.finalResponse).toBe(RESPONSE_TEMPLATES.UNAVAILABLE('hop_limit'));
  });

  test('should replay the same routes from a recorded trail', async () => {
    const { executor } = harness(
      analyticalScripts({ self_correction: [planReply(['total', 'const total = 1;'])] }),
      { sandbox: new ScriptedSandbox([errorResult('Error', 'boom'), successResult(7)]), seedSession: 'session-k' }
    );

    const result = await executor.run({ sessionId: 'session-k', message: 'What is total revenue?' });

    expect(replayRoutes(executor.router, result.trail)).toEqual(result.trail.map(entry => entry.next));
  });

  describe('cancellation', () => {
    test('should stop before the first node when already cancelled', async () => {
      const { executor, model } = harness(analyticalScripts());
      const controller = new AbortController();
      controller.abort();

      const result = await executor.run({ sessionId: 'session-l', message: 'Hi', signal: controller.signal });

      expect(result.status).toBe('cancelled');
      expect(result.finalResponse).toBeNull();
      expect(result.trail).toHaveLength(1);
      expect(result.trail[0]).toMatchObject({ node: 'intent_comprehension', outcome: 'cancelled', next: 'TERMINAL' });
      expect(model.calls).toEqual([]);
    });

    test('should stop at the next node boundary', async () => {
      const { executor } = harness(analyticalScripts(), { seedSession: 'session-m' });
      const controller = new AbortController();

      const result = await executor.run({
        sessionId: 'session-m',
        message: 'What is total revenue?',
        signal: controller.signal,
        observer: {
          onCheckpoint: event => {
            if (event.node === 'request_classification') controller.abort();
          },
        },
      });

      expect(result.status).toBe('cancelled');
      expect(nodesOf(result.trail)).toEqual(['intent_comprehension', 'request_classification', 'analysis_orchestration']);
      expect(result.trail[2].outcome).toBe('cancelled');
    });
  });

  describe('observers', () => {
    test('should report one checkpoint per trail entry', async () => {
      const { executor } = harness(analyticalScripts(), { seedSession: 'session-n' });
      const events: CheckpointEvent[] = [];

      const result = await executor.run({
        sessionId: 'session-n',
        message: 'What is total revenue?',
        runId: 'run-n',
        observer: { onCheckpoint: event => void events.push(event) },
      });

      expect(events.map(e => [e.node, e.outcome, e.next, e.hop])).toEqual(
        result.trail.map(e => [e.node, e.outcome, e.next, e.hop])
      );
      expect(new Set(events.map(e => e.runId))).toEqual(new Set(['run-n']));
    });

    test('should not let a failing observer affect the run', async () => {
      const { executor } = harness(analyticalScripts(), { seedSession: 'session-o' });

      const result = await executor.run({
        sessionId: 'session-o',
        message: 'What is total revenue?',
        observer: {
          onCheckpoint: async () => {
            throw new Error('listener gone');
          },
        },
      });

      expect(result.status).toBe('completed');
      expect(result.finalResponse).toBe('Total revenue is 500.');
    });
  });

  describe('checkpoints', () => {
    test('should expose the last checkpoint of a run', async () => {
      const { executor } = harness(analyticalScripts(), { seedSession: 'session-p' });

      const result = await executor.run({ sessionId: 'session-p', message: 'What is total revenue?', runId: 'run-p' });
      const checkpoint = await executor.getCheckpoint('run-p');

      expect(checkpoint?.finalResponse).toBe(result.finalResponse);
      expect(checkpoint?.trail).toHaveLength(result.trail.length);
      expect(await executor.getCheckpoint('run-unknown')).toBeNull();
    });

    test('should refuse to reuse the id of a finished run', async () => {
      const { executor } = harness({});

      const first = await executor.run({ sessionId: 'session-u', message: 'Tell me a joke', runId: 'run-u' });

      await expect(executor.run({ sessionId: 'session-u', message: 'Another one', runId: 'run-u' })).rejects.toThrow(
        'Run run-u has already finished'
      );
      expect(first.trail).toHaveLength(3);
      expect((await executor.getCheckpoint('run-u'))?.trail).toHaveLength(3);
    });

    test('should forget the oldest finished runs beyond the retention limit', async () => {
      const { executor } = harness({}, { retainedRuns: 1 });

      await executor.run({ sessionId: 'session-v', message: 'Tell me a joke', runId: 'run-v1' });
      await executor.run({ sessionId: 'session-v', message: 'Tell me a joke', runId: 'run-v2' });

      expect(await executor.getCheckpoint('run-v1')).toBeNull();
      expect((await executor.getCheckpoint('run-v2'))?.trail).toHaveLength(3);

      const reused = await executor.run({ sessionId: 'session-v', message: 'Tell me a joke', runId: 'run-v1' });
      expect(nodesOf(reused.trail)).toEqual(['intent_comprehension', 'request_classification', 'punt_response']);
      expect(await executor.getCheckpoint('run-v2')).toBeNull();
    });
  });

  describe('failures', () => {
    test('should reject a route table with unreachable nodes', () => {
      const routes: RouteTable = {
        ...ROUTE_TABLE,
        request_classification: {
          analytical: 'analysis_orchestration',
          conversational: 'direct_response',
          out_of_domain: 'direct_response',
        },
      };

      expect(() => harness({}, { routes })).toThrow(TopologyError);
    });

    test('should fail loudly when a node reports an undeclared outcome', async () => {
      const { executor } = harness(analyticalScripts(), {
        nodes: {
          intent_comprehension: async () => ({ outcome: JSON.parse('"intent_unclear"'), patch: {} }),
        },
      });

      await expect(executor.run({ sessionId: 'session-q', message: 'Hi' })).rejects.toThrow(
        'Node "intent_comprehension" reported unknown outcome "intent_unclear"'
      );
    });

    test('should return a failed result when a node throws', async () => {
      const { executor } = harness(analyticalScripts(), {
        seedSession: 'session-r',
        nodes: {
          computation_planning: async () => {
            throw new Error('planner crashed');
          },
        },
      });

      const result = await executor.run({ sessionId: 'session-r', message: 'What is total revenue?', runId: 'run-r' });

      expect(result.status).toBe('failed');
      expect(result.finalResponse).toBe(RESPONSE_TEMPLATES.INTERNAL_ERROR());
      expect(nodesOf(result.trail)).toEqual(['intent_comprehension', 'request_classification', 'analysis_orchestration']);
    });

    test('should validate the request', async () => {
      const { executor } = harness({});

      await expect(executor.run({ sessionId: '', message: 'Hi' })).rejects.toThrow(ValidationError);
      await expect(executor.run({ sessionId: 'session-s', message: '   ' })).rejects.toThrow('message must not be empty');
    });

    test('should refuse a run id that is already in progress', async () => {
      const { executor } = harness(analyticalScripts(), { seedSession: 'session-t' });

      const first = executor.run({ sessionId: 'session-t', message: 'What is total revenue?', runId: 'run-t' });
      await expect(executor.run({ sessionId: 'session-t', message: 'Again', runId: 'run-t' })).rejects.toThrow(
        'Run run-t is already in progress'
      );
      await expect(first).resolves.toMatchObject({ status: 'completed' });
    });
  });
});
