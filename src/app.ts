import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { logger } from './core/logger';
import { AnalystError, ValidationError, errorMessage } from './core/errors';
import type { AnalysisExecutor, RunResult } from './graph/graph';
import type { MemoryStore } from './types/collaborators';

const QueryRequestSchema = z.object({
  query: z.string().trim().min(1, 'query is required').max(10000),
  sessionId: z.string().trim().min(1, 'sessionId is required').max(128),
  runId: z.string().trim().min(1).max(128).optional(),
});

type QueryRequest = z.infer<typeof QueryRequestSchema>;

export interface AppDependencies {
  executor: AnalysisExecutor;
  memory: MemoryStore;
}

function parseQuery(body: unknown): QueryRequest {
  const parsed = QueryRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map(issue => issue.message).join('; '), {
      issues: parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return parsed.data;
}

function toResponse(result: RunResult) {
  return {
    runId: result.runId,
    status: result.status,
    answer: result.finalResponse,
    responder: result.responder,
    unavailableReason: result.unavailableReason,
    executionTime: result.durationMs,
    hops: result.state.hops,
    trail: result.trail.map(entry => ({ node: entry.node, outcome: entry.outcome, next: entry.next })),
  };
}

export function createApp({ executor, memory }: AppDependencies) {
  const app = express();
  const activeRuns = new Map<string, AbortController>();

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    logger.debug('Request', { method: req.method, path: req.path, ip: req.ip });
    next();
  });

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      activeRuns: activeRuns.size,
    });
  });

  app.post('/query', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { query, sessionId, runId = randomUUID() } = parseQuery(req.body);
      if (activeRuns.has(runId)) {
        throw new ValidationError(`Run ${runId} is already in progress`, { runId });
      }
      const controller = new AbortController();
      activeRuns.set(runId, controller);

      try {
        const result = await executor.run({ sessionId, message: query, runId, signal: controller.signal });
        res.json({ success: true, data: toResponse(result) });
      } finally {
        activeRuns.delete(runId);
      }
    } catch (error) {
      next(error);
    }
  });

  app.post('/query/stream', async (req: Request, res: Response) => {
    let request: QueryRequest;
    try {
      request = parseQuery(req.body);
      if (request.runId && activeRuns.has(request.runId)) {
        throw new ValidationError(`Run ${request.runId} is already in progress`);
      }
    } catch (error) {
      const status = error instanceof AnalystError ? error.statusCode : 400;
      res.status(status).json({ success: false, message: errorMessage(error) });
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');

    const sendEvent = (type: string, data: object) => {
      if (res.writableEnded) return;
      res.write(`data: ${JSON.stringify({ type, ...data })}\n\n`);
    };

    // A client that goes away cancels the run at the next node boundary
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    const runId = request.runId ?? randomUUID();
    activeRuns.set(runId, controller);
    sendEvent('start', { runId, message: 'Processing your query...' });

    try {
      const result = await executor.run({
        sessionId: request.sessionId,
        message: request.query,
        runId,
        signal: controller.signal,
        observer: { onCheckpoint: event => sendEvent('checkpoint', event) },
      });
      sendEvent('complete', toResponse(result));
    } catch (error) {
      logger.error('Streaming query failed', { runId, error: errorMessage(error) });
      sendEvent('error', {
        message: error instanceof AnalystError ? error.message : 'Internal server error',
        code: error instanceof AnalystError ? error.code : 'INTERNAL_ERROR',
      });
    } finally {
      activeRuns.delete(runId);
    }
    res.end();
  });

  app.post('/runs/:runId/cancel', (req: Request, res: Response) => {
    const controller = activeRuns.get(req.params.runId);
    if (!controller) {
      res.status(404).json({ success: false, message: 'No active run with that id' });
      return;
    }
    controller.abort();
    res.json({ success: true, message: 'Cancellation requested' });
  });

  app.get('/runs/:runId/checkpoint', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const state = await executor.getCheckpoint(req.params.runId);
      if (!state) {
        res.status(404).json({ success: false, message: 'Unknown run' });
        return;
      }
      res.json({
        success: true,
        data: {
          runId: state.runId,
          hops: state.hops,
          lastOutcome: state.lastOutcome,
          nextNode: state.nextNode,
          finalResponse: state.finalResponse,
          trail: state.trail,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/sessions/:sessionId/memory', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = await memory.loadSummary(req.params.sessionId);
      if (!snapshot) {
        res.status(404).json({ success: false, message: 'Unknown session' });
        return;
      }
      res.json({
        success: true,
        data: {
          sessionId: snapshot.sessionId,
          turnCount: snapshot.turnCount,
          summaries: snapshot.summaries,
          workingDataset: snapshot.workingDataset
            ? { columns: snapshot.workingDataset.columns, rows: snapshot.workingDataset.rows.length }
            : null,
          updatedAt: snapshot.updatedAt,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof AnalystError) {
      logger.warn('Request failed', { path: req.path, code: error.code, error: error.message });
      res.status(error.statusCode).json({
        success: false,
        message: error.message,
        error: { message: error.message, code: error.code, details: error.details },
      });
      return;
    }

    logger.error('Unhandled request error', { path: req.path, error: error.message, stack: error.stack });
    res.status(500).json({
      success: false,
      message: 'Internal server error',
      error: { message: 'Internal server error', code: 'INTERNAL_ERROR' },
    });
  });

  return app;
}
