import mongoose from 'mongoose';
import { config } from './core/config';
import { logger } from './core/logger';
import { errorMessage } from './core/errors';
import { createApp } from './app';
import { AnalysisExecutor } from './graph/graph';
import { LLMService } from './services/llm.service';
import { MongoDataSource } from './services/data.service';
import { MongoMemoryStore } from './services/memory.service';
import { WorkerSandbox } from './sandbox/worker-sandbox';
import { maskSensitiveData } from './utils/security';

async function connectDatabase() {
  try {
    await mongoose.connect(config.mongodb.uri, {
      dbName: config.mongodb.dbName,
    });
    logger.info('Connected to MongoDB', {
      dbName: config.mongodb.dbName,
      uri: maskSensitiveData(config.mongodb.uri),
    });
  } catch (error) {
    logger.error('MongoDB connection failed', { error: errorMessage(error) });
    process.exit(1);
  }
}

async function startServer() {
  await connectDatabase();

  const memory = new MongoMemoryStore();
  const executor = new AnalysisExecutor({
    collaborators: {
      model: new LLMService(),
      data: new MongoDataSource(),
      memory,
      sandbox: new WorkerSandbox(),
    },
  });

  const app = createApp({ executor, memory });

  app.listen(config.server.port, () => {
    logger.info('Analysis server started', {
      port: config.server.port,
      env: config.server.env,
      nodeVersion: process.version,
    });
  });
}

if (require.main === module) {
  startServer().catch((error) => {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  });
}
