import { logger } from '../core/logger';
import { ModelError, TimeoutError, errorMessage } from '../core/errors';
import { withTimeout } from '../utils/timeout';
import type { CollectionInfo, DataQuery, DataResult, SessionSnapshot } from '../types';
import type {
  Collaborators,
  DataSource,
  MemoryStore,
  ModelGateway,
  ModelResult,
  OutputSchema,
  PromptContext,
  PromptTemplate,
} from '../types/collaborators';
import type { ExecutionState } from './state';

export class TimedModelGateway implements ModelGateway {
  constructor(private readonly inner: ModelGateway, private readonly timeoutMs: number) {}

  async invoke<T>(template: PromptTemplate, schema: OutputSchema<T>, context: PromptContext): Promise<ModelResult<T>> {
    try {
      return await withTimeout(
        this.inner.invoke(template, schema, context),
        this.timeoutMs,
        `Model call for ${template.name}`
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        return { ok: false, error: new ModelError('timeout', error.message) };
      }
      return { ok: false, error: new ModelError('transport', errorMessage(error)) };
    }
  }
}

export class TimedDataSource implements DataSource {
  constructor(private readonly inner: DataSource, private readonly timeoutMs: number) {}

  async query(query: DataQuery): Promise<DataResult> {
    try {
      return await withTimeout(this.inner.query(query), this.timeoutMs, `Data query on ${query.collection}`);
    } catch (error) {
      return { ok: false, error: { kind: 'connection_failed', message: errorMessage(error) } };
    }
  }

  async describe(): Promise<CollectionInfo[]> {
    try {
      return await withTimeout(this.inner.describe(), this.timeoutMs, 'Describe external database');
    } catch (error) {
      logger.warn('Describing the external database failed', { error: errorMessage(error) });
      return [];
    }
  }
}

/** Memory calls still fail loudly; callers decide how a failure is absorbed. */
export class TimedMemoryStore implements MemoryStore {
  constructor(private readonly inner: MemoryStore, private readonly timeoutMs: number) {}

  loadSummary(sessionId: string): Promise<SessionSnapshot | null> {
    return withTimeout(this.inner.loadSummary(sessionId), this.timeoutMs, `Load memory for ${sessionId}`);
  }

  persist(sessionId: string, state: ExecutionState): Promise<void> {
    return withTimeout(this.inner.persist(sessionId, state), this.timeoutMs, `Persist memory for ${sessionId}`);
  }
}

export function withCollaboratorTimeouts(
  collaborators: Collaborators,
  timeouts: { modelTimeoutMs: number; dataTimeoutMs: number }
): Collaborators {
  return {
    model: new TimedModelGateway(collaborators.model, timeouts.modelTimeoutMs),
    data: new TimedDataSource(collaborators.data, timeouts.dataTimeoutMs),
    memory: new TimedMemoryStore(collaborators.memory, timeouts.dataTimeoutMs),
    sandbox: collaborators.sandbox,
  };
}
