import { logger } from '../../core/logger';
import type { ExecutionState } from '../state';
import type { NodeDependencies, NodeResult } from './types';

export async function retrieverNode(
  state: ExecutionState,
  { data }: NodeDependencies
): Promise<NodeResult<'data_retrieval'>> {
  if (!state.dataQuery) {
    logger.warn('Retriever reached without a data query');
    return { outcome: 'retrieval_failed', patch: {} };
  }

  const result = await data.query(state.dataQuery);

  if (!result.ok) {
    logger.warn('Data retrieval failed', { collection: state.dataQuery.collection, kind: result.error.kind });
    return {
      outcome: result.error.kind === 'not_found' ? 'retrieval_empty' : 'retrieval_failed',
      patch: {},
    };
  }

  if (result.dataset.rows.length === 0) {
    logger.info('Data retrieval returned no rows', { collection: state.dataQuery.collection });
    return { outcome: 'retrieval_empty', patch: {} };
  }

  logger.info('Working dataset replaced', {
    collection: state.dataQuery.collection,
    rows: result.dataset.rows.length,
    columns: result.dataset.columns.length,
  });

  return {
    outcome: 'retrieval_ok',
    patch: {
      workingDataset: result.dataset,
      strategy: 'compute_now',
      computationPlan: null,
      executionResult: null,
    },
  };
}
