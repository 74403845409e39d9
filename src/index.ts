import { env, loadPipelineConfig } from './config/env.js';
import { DatasetPipeline } from './application/services/dataset-pipeline.service.js';
import { createFaker } from './application/generators/index.js';
import { createStorageGateway } from './infrastructure/storage/index.js';
import { logger } from './shared/utils/logger.js';

// Exit codes are set rather than forced so file transports drain first

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', {
    error: error.message,
    stack: error.stack,
  });
  process.exitCode = 1;
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
  process.exitCode = 1;
});

async function main(): Promise<void> {
  const config = loadPipelineConfig(env);

  logger.info('🚀 Starting synthetic dataset generation', {
    environment: env.NODE_ENV,
    storage: env.STORAGE_DRIVER,
    bucket: config.bucket,
    recordCounts: config.recordCounts,
    seeded: env.GENERATION_SEED !== undefined,
  });

  const pipeline = new DatasetPipeline(
    {
      storage: createStorageGateway(env),
      faker: createFaker(env.GENERATION_SEED),
    },
    config
  );

  await pipeline.run();
}

main().then(
  () => {
    process.exitCode = 0;
  },
  (error: unknown) => {
    logger.error('❌ Dataset generation failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  }
);
