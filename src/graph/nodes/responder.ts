import { dynamicPromptBuilder } from '../../prompts/dynamic-builder';
import { promptFor } from '../../prompts/system-prompts';
import { RESPONSE_TEMPLATES } from '../../prompts/templates';
import { NarrativeSchema } from '../../schemas/structured-output';
import { logger } from '../../core/logger';
import type { PromptContext } from '../../types/collaborators';
import { ExecutionPatch, ExecutionState, latestUserTurn, respondWith } from '../state';
import type { NodeDependencies, NodeResult } from './types';

type Responder = 'analysis_response' | 'direct_response' | 'punt_response' | 'data_unavailability';

// Every responder reports the same single outcome
type Responded = { outcome: 'responded'; patch: ExecutionPatch };

/**
 * Asks the model for the user-facing message and falls back to a template
 * when it cannot be reached. Every responder appends exactly one assistant
 * turn.
 */
async function respond(
  node: Responder,
  state: ExecutionState,
  { model }: NodeDependencies,
  context: PromptContext,
  fallback: () => string
): Promise<Responded> {
  const result = await model.invoke(promptFor(node), NarrativeSchema, context);

  let message: string;
  if (result.ok) {
    message = result.value.message;
  } else {
    logger.warn('Responder fell back to a template', { node, kind: result.error.kind });
    message = fallback();
  }

  return { outcome: 'responded', patch: respondWith(state, node, message) };
}

export async function analysisResponderNode(
  state: ExecutionState,
  deps: NodeDependencies
): Promise<NodeResult<'analysis_response'>> {
  const question = state.intent?.question ?? latestUserTurn(state)?.content ?? '';
  const result = state.executionResult;

  return respond('analysis_response', state, deps, dynamicPromptBuilder.analysisResponse(state), () =>
    result?.status === 'success'
      ? RESPONSE_TEMPLATES.ANALYSIS_RESULT(question, result.output.value)
      : RESPONSE_TEMPLATES.UNAVAILABLE('no_source_data')
  );
}

export async function directResponderNode(
  state: ExecutionState,
  deps: NodeDependencies
): Promise<NodeResult<'direct_response'>> {
  return respond('direct_response', state, deps, dynamicPromptBuilder.directResponse(state), RESPONSE_TEMPLATES.DIRECT);
}

export async function puntResponderNode(
  state: ExecutionState,
  deps: NodeDependencies
): Promise<NodeResult<'punt_response'>> {
  return respond('punt_response', state, deps, dynamicPromptBuilder.punt(state), RESPONSE_TEMPLATES.PUNT);
}

export async function unavailabilityNode(
  state: ExecutionState,
  deps: NodeDependencies
): Promise<NodeResult<'data_unavailability'>> {
  const reason = state.unavailableReason ?? 'no_source_data';
  const lastError = state.executionResult?.status === 'error' ? state.executionResult.error.message : undefined;

  logger.info('Reporting data unavailability', { reason });

  return respond('data_unavailability', state, deps, dynamicPromptBuilder.unavailability(state), () =>
    RESPONSE_TEMPLATES.UNAVAILABLE(reason, lastError ? `Last error: ${lastError}` : undefined)
  );
}
