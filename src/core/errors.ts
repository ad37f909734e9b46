export class AnalystError extends Error {
    constructor(
      message: string,
      public code: string,
      public statusCode: number = 500,
      public details?: Record<string, unknown>
    ) {
      super(message);
      this.name = 'AnalystError';
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Graph contract break: unknown outcome, missing route entry, unreachable
   * node. The only error the executor raises to its caller.
   */
  export class TopologyError extends AnalystError {
    constructor(message: string, details?: Record<string, unknown>) {
      super(message, 'TOPOLOGY_ERROR', 500, details);
      this.name = 'TopologyError';
    }
  }

  export class ValidationError extends AnalystError {
    constructor(message: string = 'Validation failed', details?: Record<string, unknown>) {
      super(message, 'VALIDATION_ERROR', 400, details);
      this.name = 'ValidationError';
    }
  }

  export type ModelErrorKind = 'timeout' | 'transport' | 'invalid_output';

  export class ModelError extends AnalystError {
    constructor(
      public kind: ModelErrorKind,
      message: string,
      details?: Record<string, unknown>
    ) {
      super(message, 'MODEL_ERROR', 502, details);
      this.name = 'ModelError';
    }
  }

  export type DataErrorKind = 'not_found' | 'connection_failed' | 'invalid_query';

  export class DataAccessError extends AnalystError {
    constructor(
      public kind: DataErrorKind,
      message: string,
      details?: Record<string, unknown>
    ) {
      super(message, 'RETRIEVAL_ERROR', 502, details);
      this.name = 'DataAccessError';
    }
  }

  export class TimeoutError extends AnalystError {
    constructor(message: string, public timeoutMs: number) {
      super(`Timeout: ${message} (${timeoutMs}ms)`, 'TIMEOUT', 504, { timeoutMs });
      this.name = 'TimeoutError';
    }
  }

  export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
  }
