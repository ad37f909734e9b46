import { dynamicPromptBuilder } from '../../prompts/dynamic-builder';
import { promptFor } from '../../prompts/system-prompts';
import { SummarySchema } from '../../schemas/structured-output';
import { logger } from '../../core/logger';
import { errorMessage } from '../../core/errors';
import { ExecutionState, latestUserTurn } from '../state';
import type { NodeDependencies, NodeResult } from './types';

const FALLBACK_ANSWER_LENGTH = 200;

export function fallbackSummary(state: ExecutionState): string {
  const question = state.intent?.question ?? latestUserTurn(state)?.content ?? '';
  const answer = (state.finalResponse ?? '').replace(/\s+/g, ' ').trim();
  const clipped = answer.length > FALLBACK_ANSWER_LENGTH ? `${answer.slice(0, FALLBACK_ANSWER_LENGTH)}...` : answer;
  return `Asked: ${question} Answered: ${clipped}`;
}

/**
 * Writes the turn into session memory. A failed write is logged and the run
 * still completes.
 */
export async function summarizerNode(
  state: ExecutionState,
  { model, memory }: NodeDependencies
): Promise<NodeResult<'summarization'>> {
  const result = await model.invoke(promptFor('summarization'), SummarySchema, dynamicPromptBuilder.summarization(state));

  const summary = result.ok ? result.value.summary : fallbackSummary(state);
  if (!result.ok) {
    logger.warn('Summarization fell back to a plain summary', { kind: result.error.kind });
  }

  try {
    await memory.persist(state.sessionId, { ...state, summary });
  } catch (error) {
    logger.error('Failed to persist session memory', { sessionId: state.sessionId, error: errorMessage(error) });
  }

  return { outcome: 'persisted', patch: { summary } };
}
