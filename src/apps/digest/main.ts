import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { DigestAppModule } from './app.module';
import { DigestRunnerService } from '@/shared/digest/services/digest-runner.service';
import {
  DIGEST_CRON,
  DIGEST_TIME_ZONE,
} from '@/shared/digest/digest.constants';
import { setupGracefulShutdown } from '@/shared/utils/graceful-shutdown';
import { errorMessage, errorStack } from '@/shared/lib/util';

async function bootstrap() {
  const logger = new Logger('Digest');
  const app = await NestFactory.createApplicationContext(DigestAppModule);

  if (process.argv.includes('--once')) {
    logger.log('▶️ Running a single digest pass');
    const report = await app.get(DigestRunnerService).run();
    await app.close();
    process.exit(report.errors.length > 0 && !report.emailSent ? 1 : 0);
  }

  setupGracefulShutdown(app);
  logger.log(`🕒 Digest scheduler started (${DIGEST_CRON}, ${DIGEST_TIME_ZONE})`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Digest').error(
    `Failed to start: ${errorMessage(error)}`,
    errorStack(error),
  );
  process.exit(1);
});
