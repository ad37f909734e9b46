import * as readline from 'readline';
import { randomUUID } from 'crypto';
import mongoose from 'mongoose';
import { config } from './core/config';
import { errorMessage } from './core/errors';
import { AnalysisExecutor, RunResult } from './graph/graph';
import { LLMService } from './services/llm.service';
import { MongoDataSource } from './services/data.service';
import { MongoMemoryStore } from './services/memory.service';
import { WorkerSandbox } from './sandbox/worker-sandbox';

export function formatTrail(result: RunResult): string {
  return result.trail
    .map(entry => `   ${String(entry.hop).padStart(2)}. ${entry.node} -> ${entry.outcome} -> ${entry.next}`)
    .join('\n');
}

async function initCLI() {
  await mongoose.connect(config.mongodb.uri, {
    dbName: config.mongodb.dbName,
  });

  const executor = new AnalysisExecutor({
    collaborators: {
      model: new LLMService(),
      data: new MongoDataSource(),
      memory: new MongoMemoryStore(),
      sandbox: new WorkerSandbox(),
    },
  });

  const sessionId = process.argv[2] || `cli-${randomUUID()}`;

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log('\nAnalysis CLI');
  console.log(`Session: ${sessionId}`);
  console.log('Type your question or "exit" to quit\n');

  const close = async () => {
    rl.close();
    await mongoose.disconnect();
  };

  const answer = async (query: string) => {
    try {
      console.log('\nProcessing...\n');
      const result = await executor.run({ sessionId, message: query });

      console.log('━'.repeat(80));
      console.log(result.finalResponse ?? '(no response)');
      console.log('━'.repeat(80));
      console.log(`Status: ${result.status}`);
      console.log(`Responder: ${result.responder ?? 'none'}`);
      if (result.unavailableReason) {
        console.log(`Unavailable: ${result.unavailableReason}`);
      }
      console.log(`Execution Time: ${result.durationMs}ms`);
      console.log(`Trail:\n${formatTrail(result)}\n`);
    } catch (error) {
      console.error('\nError:', errorMessage(error), '\n');
    }
  };

  const askQuestion = () => {
    rl.question('analyst > ', input => {
      const query = input.trim();

      if (query.toLowerCase() === 'exit') {
        console.log('\nGoodbye!\n');
        close().catch(error => console.error(errorMessage(error)));
        return;
      }

      if (!query) {
        askQuestion();
        return;
      }

      answer(query)
        .then(askQuestion)
        .catch(error => console.error(errorMessage(error)));
    });
  };

  askQuestion();
}

if (require.main === module) {
  initCLI().catch(error => {
    console.error(errorMessage(error));
    process.exit(1);
  });
}
