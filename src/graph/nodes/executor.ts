import { logger } from '../../core/logger';
import type { ExecutionState } from '../state';
import type { NodeDependencies, NodeResult } from './types';

export async function executorNode(
  state: ExecutionState,
  { sandbox, limits }: NodeDependencies
): Promise<NodeResult<'sandbox_environment'>> {
  if (!state.computationPlan) {
    return {
      outcome: 'exec_error',
      patch: {
        executionResult: {
          status: 'error',
          error: { kind: 'invalid_plan', message: 'There is no computation plan to run', stepIndex: null },
        },
      },
    };
  }

  const executionResult = await sandbox.run(state.computationPlan, state.workingDataset, limits.sandbox);

  if (executionResult.status === 'error') {
    logger.warn('Sandbox execution failed', executionResult.error);
    return { outcome: 'exec_error', patch: { executionResult } };
  }

  logger.info('Sandbox execution succeeded', { outputs: Object.keys(executionResult.output.outputs) });
  return { outcome: 'exec_success', patch: { executionResult } };
}
