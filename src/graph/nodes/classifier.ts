import { dynamicPromptBuilder } from '../../prompts/dynamic-builder';
import { promptFor } from '../../prompts/system-prompts';
import { RequestClassificationSchema } from '../../schemas/structured-output';
import { logger } from '../../core/logger';
import type { ExecutionState } from '../state';
import type { NodeDependencies, NodeResult } from './types';

export async function classifierNode(
  state: ExecutionState,
  { model }: NodeDependencies
): Promise<NodeResult<'request_classification'>> {
  const result = await model.invoke(
    promptFor('request_classification'),
    RequestClassificationSchema,
    dynamicPromptBuilder.classification(state)
  );

  if (!result.ok) {
    logger.warn('Classification failed, treating request as out of domain', { kind: result.error.kind });
    return { outcome: 'out_of_domain', patch: { routeClass: 'out_of_domain' } };
  }

  logger.info('Request classified', { route: result.value.route });
  return { outcome: result.value.route, patch: { routeClass: result.value.route } };
}
