import { Worker } from 'worker_threads';
import { z } from 'zod';
import { createLogger } from '../core/logger';
import { errorMessage } from '../core/errors';
import type { ComputationPlan, Dataset, ExecutionResult, JsonValue, SandboxFault } from '../types';
import type { SandboxLimits } from '../types/graph';
import type { Sandbox } from '../types/collaborators';
import { HELPERS_SOURCE, WORKER_SOURCE } from './worker-source';

const log = createLogger('sandbox');

// How long past the deadline a stuck worker may live before it is terminated
const KILL_GRACE_MS = 250;

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

const WorkerMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('step'), index: z.number().int() }),
  z.object({
    type: z.literal('success'),
    value: JsonValueSchema,
    outputs: z.record(JsonValueSchema),
    logs: z.array(z.string()),
  }),
  z.object({
    type: z.literal('fault'),
    error: z.object({
      kind: z.string(),
      message: z.string(),
      stepIndex: z.number().int().nullable(),
    }),
  }),
]);

function fault(kind: string, message: string, stepIndex: number | null): ExecutionResult {
  const error: SandboxFault = { kind, message, stepIndex };
  return { status: 'error', error };
}

/**
 * Runs a computation plan in a fresh worker thread per invocation. The worker
 * gets an empty environment and a heap ceiling; the plan itself runs inside a
 * `vm` context with string code generation disabled. `run` never rejects.
 */
export class WorkerSandbox implements Sandbox {
  constructor(private readonly killGraceMs: number = KILL_GRACE_MS) {}

  run(plan: ComputationPlan, dataset: Dataset | null, limits: SandboxLimits): Promise<ExecutionResult> {
    if (plan.steps.length === 0) {
      return Promise.resolve(fault('invalid_plan', 'The computation plan has no steps', null));
    }

    return new Promise<ExecutionResult>(resolve => {
      let settled = false;
      let currentStep: number | null = null;
      const startedAt = Date.now();

      const worker = new Worker(WORKER_SOURCE, {
        eval: true,
        env: {},
        resourceLimits: { maxOldGenerationSizeMb: limits.memoryLimitMb },
        workerData: {
          helpers: HELPERS_SOURCE,
          datasetJson: JSON.stringify(dataset?.rows ?? []),
          steps: plan.steps.map(step => ({ output: step.output, code: step.code })),
          timeoutMs: limits.timeoutMs,
        },
      });

      const finish = (result: ExecutionResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);

        worker.terminate().catch(error => {
          log.warn('Sandbox worker did not terminate cleanly', { error: errorMessage(error) });
        });

        log.debug('Sandbox run finished', {
          status: result.status,
          kind: result.status === 'error' ? result.error.kind : undefined,
          steps: plan.steps.length,
          durationMs: Date.now() - startedAt,
        });
        resolve(result);
      };

      const timer = setTimeout(() => {
        log.warn('Sandbox worker killed after deadline', { timeoutMs: limits.timeoutMs, step: currentStep });
        finish(fault('timeout', `Execution exceeded ${limits.timeoutMs}ms`, currentStep));
      }, limits.timeoutMs + this.killGraceMs);

      worker.on('message', (raw: unknown) => {
        const parsed = WorkerMessageSchema.safeParse(raw);
        if (!parsed.success) {
          finish(fault('worker_crashed', 'Malformed message from sandbox worker', currentStep));
          return;
        }

        const message = parsed.data;
        switch (message.type) {
          case 'step':
            currentStep = message.index;
            break;
          case 'success':
            finish({
              status: 'success',
              output: { value: message.value, outputs: message.outputs, logs: message.logs },
            });
            break;
          case 'fault':
            finish({ status: 'error', error: message.error });
            break;
        }
      });

      worker.on('error', error => {
        if ('code' in error && error.code === 'ERR_WORKER_OUT_OF_MEMORY') {
          finish(fault('memory_limit', `Execution exceeded ${limits.memoryLimitMb}MB of memory`, currentStep));
          return;
        }
        finish(fault('worker_crashed', error.message, currentStep));
      });

      worker.on('exit', code => {
        finish(fault('worker_crashed', `Sandbox worker exited with code ${code}`, currentStep));
      });
    });
  }
}
