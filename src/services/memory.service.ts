import { config } from '../core/config';
import { logger } from '../core/logger';
import { SessionMemory } from '../models/SessionMemory';
import type { ExecutionState } from '../graph/state';
import type { ConversationTurn, Dataset, SessionSnapshot, TurnSummary } from '../types';
import type { MemoryStore } from '../types/collaborators';

export interface MemoryLimits {
  maxSummaries: number;
  maxDatasetRows: number;
}

const DEFAULT_LIMITS: MemoryLimits = {
  maxSummaries: config.memory.maxSummaries,
  maxDatasetRows: config.memory.maxDatasetRows,
};

/** What one finished turn adds to its session. */
export interface TurnRecord {
  turnNumber: number;
  summary: TurnSummary;
  turns: ConversationTurn[];
  workingDataset: Dataset | null;
}

/**
 * The turn's summary, its transcript, and the working dataset when it is
 * small enough to keep whole.
 */
export function turnRecord(state: ExecutionState, limits: MemoryLimits = DEFAULT_LIMITS): TurnRecord {
  let workingDataset = state.workingDataset;
  if (workingDataset && workingDataset.rows.length > limits.maxDatasetRows) {
    logger.warn('Working dataset too large to persist, dropping it', {
      sessionId: state.sessionId,
      rows: workingDataset.rows.length,
      maxRows: limits.maxDatasetRows,
    });
    workingDataset = null;
  }

  return {
    turnNumber: state.turnNumber,
    summary: {
      turn: state.turnNumber,
      summary: state.summary ?? state.finalResponse ?? '',
      dataQuery: state.dataQuery,
      createdAt: new Date().toISOString(),
    },
    turns: state.turnHistory,
    workingDataset,
  };
}

/** Folds a finished run into the session snapshot. */
export function nextSnapshot(
  previous: SessionSnapshot | null,
  state: ExecutionState,
  limits: MemoryLimits = DEFAULT_LIMITS
): SessionSnapshot {
  const record = turnRecord(state, limits);

  return {
    sessionId: state.sessionId,
    turnCount: Math.max(previous?.turnCount ?? 0, record.turnNumber),
    summaries: [...(previous?.summaries ?? []), record.summary].slice(-limits.maxSummaries),
    turns: [...(previous?.turns ?? []), ...record.turns].slice(-limits.maxSummaries * 2),
    workingDataset: record.workingDataset,
    updatedAt: record.summary.createdAt,
  };
}

export class InMemoryMemoryStore implements MemoryStore {
  private sessions: Map<string, SessionSnapshot> = new Map();

  constructor(private readonly limits: MemoryLimits = DEFAULT_LIMITS) {}

  async loadSummary(sessionId: string): Promise<SessionSnapshot | null> {
    const snapshot = this.sessions.get(sessionId);
    return snapshot ? structuredClone(snapshot) : null;
  }

  async persist(sessionId: string, state: ExecutionState): Promise<void> {
    const snapshot = nextSnapshot(this.sessions.get(sessionId) ?? null, state, this.limits);
    this.sessions.set(sessionId, structuredClone(snapshot));
    logger.debug('Session memory persisted', { sessionId, turn: state.turnNumber });
  }

  seed(snapshot: SessionSnapshot): void {
    this.sessions.set(snapshot.sessionId, structuredClone(snapshot));
  }

  clear(): void {
    this.sessions.clear();
  }
}

export function sessionUpdate(record: TurnRecord, limits: MemoryLimits) {
  return {
    $push: {
      summaries: { $each: [record.summary], $slice: -limits.maxSummaries },
      turns: { $each: record.turns, $slice: -limits.maxSummaries * 2 },
    },
    $max: { turnCount: record.turnNumber },
    $set: { workingDataset: record.workingDataset },
  };
}

export class MongoMemoryStore implements MemoryStore {
  constructor(private readonly limits: MemoryLimits = DEFAULT_LIMITS) {}

  async loadSummary(sessionId: string): Promise<SessionSnapshot | null> {
    const doc = await SessionMemory.findOne({ sessionId });
    if (!doc) return null;

    return {
      sessionId: doc.sessionId,
      turnCount: doc.turnCount,
      summaries: doc.summaries.map(s => ({
        turn: s.turn,
        summary: s.summary,
        dataQuery: s.dataQuery ?? null,
        createdAt: s.createdAt,
      })),
      turns: doc.turns.map(t => ({ role: t.role, content: t.content, timestamp: t.timestamp })),
      workingDataset: doc.workingDataset ?? null,
      updatedAt: doc.updatedAt.toISOString(),
    };
  }

  // Appends in a single update; concurrent turns on one session both land
  async persist(sessionId: string, state: ExecutionState): Promise<void> {
    const record = turnRecord(state, this.limits);

    await SessionMemory.updateOne({ sessionId }, sessionUpdate(record, this.limits), { upsert: true });

    logger.debug('Session memory persisted', { sessionId, turn: state.turnNumber });
  }
}
