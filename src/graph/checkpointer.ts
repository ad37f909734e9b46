import { MemorySaver } from '@langchain/langgraph';

/**
 * In-process checkpointer that can drop a thread. Checkpoints live in
 * `storage` by thread id; pending writes are keyed by a JSON array whose
 * first element is the thread id.
 */
export class RunCheckpointer extends MemorySaver {
  forget(threadId: string): void {
    delete this.storage[threadId];

    for (const key of Object.keys(this.writes)) {
      if (threadOf(key) === threadId) delete this.writes[key];
    }
  }

  has(threadId: string): boolean {
    return threadId in this.storage;
  }
}

function threadOf(key: string): string | null {
  try {
    const parts: unknown = JSON.parse(key);
    return Array.isArray(parts) && typeof parts[0] === 'string' ? parts[0] : null;
  } catch {
    return null;
  }
}
