import { dynamicPromptBuilder } from '../../prompts/dynamic-builder';
import { promptFor } from '../../prompts/system-prompts';
import { IntentComprehensionSchema } from '../../schemas/structured-output';
import { logger } from '../../core/logger';
import { ExecutionState, latestUserTurn } from '../state';
import type { NodeDependencies, NodeResult } from './types';

export async function intentNode(
  state: ExecutionState,
  { model }: NodeDependencies
): Promise<NodeResult<'intent_comprehension'>> {
  const message = latestUserTurn(state)?.content ?? '';

  const result = await model.invoke(
    promptFor('intent_comprehension'),
    IntentComprehensionSchema,
    dynamicPromptBuilder.intent(state)
  );

  if (!result.ok) {
    logger.warn('Intent comprehension fell back to the raw message', { kind: result.error.kind });
    return {
      outcome: 'intent_resolved',
      patch: {
        intent: { question: message, relevantTurns: [], rationale: 'Model unavailable; message taken verbatim' },
      },
    };
  }

  // Only turns that exist in the summary can be referenced
  const known = new Set(state.summaries.map(s => s.turn));
  const relevantTurns = [...new Set(result.value.relevantTurns)].filter(turn => known.has(turn));

  logger.info('Intent resolved', { question: result.value.question, relevantTurns });

  return {
    outcome: 'intent_resolved',
    patch: { intent: { ...result.value, relevantTurns } },
  };
}
