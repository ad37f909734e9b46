import { dynamicPromptBuilder } from '../../prompts/dynamic-builder';
import { promptFor } from '../../prompts/system-prompts';
import { AnalysisOrchestrationSchema, AnalysisOrchestration } from '../../schemas/structured-output';
import { logger } from '../../core/logger';
import type { Strategy } from '../../types';
import type { ExecutionState } from '../state';
import type { NodeDependencies, NodeResult } from './types';

type Decision = AnalysisOrchestration['decision'];

const STRATEGIES: Record<Decision, Strategy | null> = {
  data_sufficient: 'use_existing_data',
  need_retrieval: 'retrieve_external_data',
  ready_to_compute: 'compute_now',
  data_unavailable: null,
};

/**
 * Holds the model's decision to what the state can actually support: nothing
 * is computed without a dataset and nothing is retrieved without a query.
 */
export function guardDecision(decision: Decision, hasDataset: boolean, hasQuery: boolean): Decision {
  if ((decision === 'data_sufficient' || decision === 'ready_to_compute') && !hasDataset) {
    return hasQuery ? 'need_retrieval' : 'data_unavailable';
  }
  if (decision === 'need_retrieval' && !hasQuery) {
    return 'data_unavailable';
  }
  return decision;
}

export async function orchestratorNode(
  state: ExecutionState,
  { model, data }: NodeDependencies
): Promise<NodeResult<'analysis_orchestration'>> {
  const collections = await data.describe();

  const result = await model.invoke(
    promptFor('analysis_orchestration'),
    AnalysisOrchestrationSchema,
    dynamicPromptBuilder.orchestration(state, collections)
  );

  if (!result.ok) {
    logger.warn('Orchestration failed, no data source can be chosen', { kind: result.error.kind });
    return { outcome: 'data_unavailable', patch: { strategy: null } };
  }

  const { query } = result.value;
  const decision = guardDecision(result.value.decision, state.workingDataset !== null, query !== null);

  if (decision !== result.value.decision) {
    logger.info('Orchestration decision adjusted', { proposed: result.value.decision, decision });
  }

  return {
    outcome: decision,
    patch: {
      strategy: STRATEGIES[decision],
      dataQuery: decision === 'need_retrieval' ? query : state.dataQuery,
    },
  };
}
