import { dynamicPromptBuilder } from '../../prompts/dynamic-builder';
import { promptFor } from '../../prompts/system-prompts';
import { ObservationSchema } from '../../schemas/structured-output';
import { logger } from '../../core/logger';
import type { ExecutionState } from '../state';
import type { NodeDependencies, NodeResult } from './types';

/** Judges whether a successful execution actually answers the question. */
export async function criticNode(
  state: ExecutionState,
  { model }: NodeDependencies
): Promise<NodeResult<'observation'>> {
  if (state.executionResult?.status !== 'success') {
    return {
      outcome: 'insufficient',
      patch: { observationVerdict: { status: 'insufficient', rationale: 'There is no successful execution result' } },
    };
  }

  const result = await model.invoke(promptFor('observation'), ObservationSchema, dynamicPromptBuilder.observation(state));

  if (!result.ok) {
    logger.warn('Observation failed, result treated as insufficient', { kind: result.error.kind });
    return {
      outcome: 'insufficient',
      patch: { observationVerdict: { status: 'insufficient', rationale: `Result could not be verified (${result.error.kind})` } },
    };
  }

  logger.info('Observation verdict', { status: result.value.status });
  return { outcome: result.value.status, patch: { observationVerdict: result.value } };
}
