import { Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import {
  DIGEST_CRON,
  DIGEST_JOB_NAME,
  DIGEST_TIME_ZONE,
} from '@/shared/digest/digest.constants';
import { DigestRunnerService } from './digest-runner.service';
import { errorMessage } from '@/shared/lib/util';

@Injectable()
export class DigestSchedulerService {
  private readonly logger = new Logger(DigestSchedulerService.name);
  private running = false;

  constructor(private readonly runner: DigestRunnerService) {}

  @Cron(DIGEST_CRON, { name: DIGEST_JOB_NAME, timeZone: DIGEST_TIME_ZONE })
  async handleDigest() {
    if (this.running) {
      this.logger.warn('Previous digest run still in progress, skipping this tick');
      return;
    }

    this.running = true;
    try {
      await this.runner.run();
    } catch (error) {
      this.logger.error(`Scheduled digest failed: ${errorMessage(error)}`);
    } finally {
      this.running = false;
    }
  }
}
