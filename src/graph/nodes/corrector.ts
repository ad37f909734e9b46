import { dynamicPromptBuilder } from '../../prompts/dynamic-builder';
import { promptFor } from '../../prompts/system-prompts';
import { ComputationPlanningSchema } from '../../schemas/structured-output';
import { logger } from '../../core/logger';
import type { RetryKind } from '../../types';
import type { PromptContext } from '../../types/collaborators';
import type { ExecutionState } from '../state';
import type { NodeDependencies, NodeResult } from './types';

type RevisionOutcome = 'plan_ready' | 'retry_exhausted' | 'plan_failed';

/**
 * Shared body of self-correction and self-reflection. The attempt is counted
 * before the model is called, so a failed rewrite still uses up an attempt.
 */
async function revisePlan(
  kind: RetryKind,
  state: ExecutionState,
  { model, limits }: NodeDependencies,
  context: PromptContext
): Promise<{ outcome: RevisionOutcome; patch: NodeResult<'self_correction'>['patch'] }> {
  const max = kind === 'correction' ? limits.maxCorrections : limits.maxReflections;
  const used = state.retryCounters[kind];

  if (used >= max) {
    logger.warn('Retry budget exhausted', { kind, used, max });
    return { outcome: 'retry_exhausted', patch: {} };
  }

  const retryCounters = { ...state.retryCounters, [kind]: used + 1 };
  const name = kind === 'correction' ? 'self_correction' : 'self_reflection';
  const result = await model.invoke(promptFor(name), ComputationPlanningSchema, context);

  if (!result.ok) {
    logger.warn('Plan revision failed', { kind, attempt: used + 1, error: result.error.message });
    return { outcome: 'plan_failed', patch: { retryCounters } };
  }

  logger.info('Plan revised', { kind, attempt: used + 1, steps: result.value.steps.length });
  return {
    outcome: 'plan_ready',
    patch: { retryCounters, computationPlan: result.value, executionResult: null, observationVerdict: null },
  };
}

export async function correctionNode(
  state: ExecutionState,
  deps: NodeDependencies
): Promise<NodeResult<'self_correction'>> {
  return revisePlan('correction', state, deps, dynamicPromptBuilder.correction(state));
}

export async function reflectionNode(
  state: ExecutionState,
  deps: NodeDependencies
): Promise<NodeResult<'self_reflection'>> {
  return revisePlan('reflection', state, deps, dynamicPromptBuilder.reflection(state));
}
