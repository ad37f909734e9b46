import mongoose from 'mongoose';
import { config } from '../src/core/config';
import { logger } from '../src/core/logger';
import { errorMessage } from '../src/core/errors';
import { SessionMemory } from '../src/models/SessionMemory';

async function migrate() {
  logger.info('Starting migration...');

  await mongoose.connect(config.mongodb.uri, {
    dbName: config.mongodb.dbName,
  });

  logger.info(`Syncing indexes for ${config.mongodb.memoryCollection}`);
  const dropped = await SessionMemory.syncIndexes();
  logger.info(`${config.mongodb.memoryCollection} indexes synced`, { dropped });

  logger.info('Migration complete');
  await mongoose.disconnect();
}

migrate().catch(error => {
  logger.error('Migration failed', { error: errorMessage(error) });
  process.exit(1);
});
