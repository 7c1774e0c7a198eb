import path from 'path';
import { createApp } from './app.js';
import { env } from './config/env.js';
import { logger } from './log/logger.js';
import { createOrchestrator } from './pipeline/createOrchestrator.js';

const app = createApp(createOrchestrator(env));

const server = app.listen(env.PORT, () => {
  logger.info(
    { port: env.PORT, llm: `${env.LLM_BASE_URL} (${env.LLM_MODEL})`, output: path.resolve(env.OUTPUT_DIR) },
    `JobPost Helper API listening on http://localhost:${env.PORT}`,
  );
});

process.on('SIGINT', () => { server.close(() => process.exit(0)); });
process.on('SIGTERM', () => { server.close(() => process.exit(0)); });
