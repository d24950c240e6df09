import { Injectable, Logger } from '@nestjs/common';
import { appendLines, readLines } from '@/shared/digest/utils/line-file';

/**
 * Ids of videos already delivered, one per line.
 */
@Injectable()
export class ProcessedVideoLedger {
  private readonly logger = new Logger(ProcessedVideoLedger.name);

  constructor(private readonly filePath: string) {}

  async load(): Promise<Set<string>> {
    const ids = new Set(await readLines(this.filePath));
    this.logger.debug(`${ids.size} processed videos in ${this.filePath}`);
    return ids;
  }

  async markProcessed(contentIds: string[]): Promise<void> {
    await appendLines(this.filePath, contentIds);
    this.logger.log(`Marked ${contentIds.length} videos as processed`);
  }
}
