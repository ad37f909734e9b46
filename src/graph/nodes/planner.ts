import { dynamicPromptBuilder } from '../../prompts/dynamic-builder';
import { promptFor } from '../../prompts/system-prompts';
import { ComputationPlanningSchema } from '../../schemas/structured-output';
import { logger } from '../../core/logger';
import type { ExecutionState } from '../state';
import type { NodeDependencies, NodeResult } from './types';

export async function plannerNode(
  state: ExecutionState,
  { model }: NodeDependencies
): Promise<NodeResult<'computation_planning'>> {
  if (!state.workingDataset) {
    logger.warn('Planner reached without a working dataset');
    return { outcome: 'plan_failed', patch: {} };
  }

  const result = await model.invoke(
    promptFor('computation_planning'),
    ComputationPlanningSchema,
    dynamicPromptBuilder.planning(state)
  );

  if (!result.ok) {
    logger.warn('Computation planning failed', { kind: result.error.kind, error: result.error.message });
    return { outcome: 'plan_failed', patch: {} };
  }

  logger.info('Computation plan ready', {
    analysisType: result.value.analysisType,
    steps: result.value.steps.length,
  });

  return {
    outcome: 'plan_ready',
    patch: { computationPlan: result.value, executionResult: null, observationVerdict: null },
  };
}
