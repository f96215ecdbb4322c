import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { METRICS_JSON } from './metrics/config/metrics.constants';
import { MetricsGeneratorService } from './metrics/services/metrics-generator.service';

// Metrics step of the weekly pipeline: one generation, then exit.
const logger = new Logger('RunMetrics');

async function run(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    await app.get(MetricsGeneratorService).generateSnapshot();
    logger.log(`metrics -> ${METRICS_JSON}`);
  } finally {
    await app.close();
  }
}

run().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`metrics run failed: ${message}`);
  process.exitCode = 1;
});
