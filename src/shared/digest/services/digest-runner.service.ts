import { Injectable, Logger } from '@nestjs/common';
import { DigestConfig } from '@/shared/config/pipeline.config';
import { VideoCatalogService } from '@/shared/youtube/services/video-catalog.service';
import { VideoSummary } from '@/shared/youtube/interfaces/video.interface';
import { TranscriptFetcherService } from '@/shared/transcript/services/transcript-fetcher.service';
import { TranscriptCacheService } from '@/shared/transcript/services/transcript-cache.service';
import { ProxyPoolService } from '@/shared/proxy/services/proxy-pool.service';
import {
  GeminiService,
  SUMMARY_PLACEHOLDERS,
} from '@/shared/gemini/gemini.service';
import { MailService } from '@/shared/mail/mail.service';
import {
  DigestItem,
  DigestRunReport,
  RenderedDigest,
} from '@/shared/digest/interfaces/digest.interface';
import {
  renderDigest,
  renderEmptyDigest,
} from '@/shared/digest/templates/digest.template';
import { readLines } from '@/shared/digest/utils/line-file';
import { ProcessedVideoLedger } from './processed-video-ledger.service';
import { Clock } from '@/shared/lib/clock';
import { errorMessage } from '@/shared/lib/util';

const HOUR_MS = 60 * 60 * 1000;

/**
 * One digest pass: discover uploads, filter, summarize each video in turn,
 * mail the result and record what was sent.
 */
@Injectable()
export class DigestRunnerService {
  private readonly logger = new Logger(DigestRunnerService.name);

  constructor(
    private readonly config: DigestConfig,
    private readonly catalog: VideoCatalogService,
    private readonly fetcher: TranscriptFetcherService,
    private readonly cache: TranscriptCacheService,
    private readonly proxyPool: ProxyPoolService,
    private readonly gemini: GeminiService,
    private readonly mail: MailService,
    private readonly ledger: ProcessedVideoLedger,
    private readonly clock: Clock,
  ) {}

  async run(): Promise<DigestRunReport> {
    const report: DigestRunReport = {
      startedAt: this.clock.now(),
      finishedAt: this.clock.now(),
      channels: 0,
      discovered: 0,
      alreadyProcessed: 0,
      offTopic: 0,
      processed: 0,
      transcriptsFound: 0,
      emailSent: false,
      errors: [],
    };

    try {
      await this.execute(report);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Digest run failed: ${message}`);
      report.errors.push(message);
    }

    this.proxyPool.logStats();
    const cacheStats = this.cache.stats();
    this.logger.log(
      `Cache: ${cacheStats.validEntries} valid, ${cacheStats.expiredEntries} expired (${cacheStats.cacheFile})`,
    );

    report.finishedAt = this.clock.now();
    this.logger.log(
      `Digest finished: ${report.processed} processed, ${report.transcriptsFound} transcripts, email ${report.emailSent ? 'sent' : 'not sent'}`,
    );
    return report;
  }

  async resolveChannelIds(): Promise<string[]> {
    const fromFile = await readLines(this.config.channelIdsFile);
    if (fromFile.length > 0) {
      this.logger.log(
        `Loaded ${fromFile.length} channel ids from ${this.config.channelIdsFile}`,
      );
      return fromFile;
    }
    return this.config.fallbackChannelIds;
  }

  private async execute(report: DigestRunReport): Promise<void> {
    const removed = this.cache.cleanup();
    if (removed > 0) {
      this.logger.log(`Removed ${removed} expired transcripts from the cache`);
    }

    const channelIds = await this.resolveChannelIds();
    report.channels = channelIds.length;
    if (channelIds.length === 0) {
      throw new Error(
        `No channel ids in ${this.config.channelIdsFile} or TARGET_CHANNEL_IDS`,
      );
    }
    if (this.config.recipients.length === 0) {
      throw new Error('No digest recipients configured');
    }

    const since = new Date(
      this.clock.now().getTime() - this.config.lookbackHours * HOUR_MS,
    );
    const videos = await this.catalog.getRecentVideos(channelIds, since);
    report.discovered = videos.length;

    const processedIds = await this.ledger.load();
    const fresh = videos.filter((video) => !processedIds.has(video.contentId));
    report.alreadyProcessed = videos.length - fresh.length;

    const relevant = await this.filterByTopic(fresh);
    report.offTopic = fresh.length - relevant.length;

    if (relevant.length === 0) {
      this.logger.log('No new videos found, sending notification');
      await this.send(renderEmptyDigest());
      report.emailSent = true;
      return;
    }

    const selected = relevant.slice(0, this.config.maxVideos);
    if (relevant.length > selected.length) {
      this.logger.log(`Limiting to ${selected.length} of ${relevant.length} videos`);
    }

    const items = await this.summarizeAll(selected, report);
    await this.send(renderDigest(items, this.clock.now()));
    report.emailSent = true;

    await this.ledger.markProcessed(items.map((item) => item.video.contentId));
  }

  private async filterByTopic(videos: VideoSummary[]): Promise<VideoSummary[]> {
    const relevant: VideoSummary[] = [];
    for (const video of videos) {
      if (
        await this.gemini.isRelevant(
          video.title,
          video.description,
          this.config.topic,
        )
      ) {
        relevant.push(video);
      } else {
        this.logger.debug(`Off topic, skipping: ${video.title}`);
      }
    }
    return relevant;
  }

  /**
   * Strictly one video at a time, with a pause between videos.
   */
  private async summarizeAll(
    videos: VideoSummary[],
    report: DigestRunReport,
  ): Promise<DigestItem[]> {
    const items: DigestItem[] = [];

    for (const [index, video] of videos.entries()) {
      if (index > 0 && this.config.interItemDelayMs > 0) {
        await this.clock.sleep(this.config.interItemDelayMs);
      }
      this.logger.log(
        `[${index + 1}/${videos.length}] Processing: ${video.title} (${video.url})`,
      );

      let summary: string = SUMMARY_PLACEHOLDERS.noTranscript;
      let hasTranscript = false;
      try {
        const transcript = await this.fetcher.fetchTranscript(video.contentId);
        if (transcript) {
          hasTranscript = true;
          report.transcriptsFound++;
          summary = await this.gemini.summarize(transcript);
        }
      } catch (error) {
        const message = `${video.contentId}: ${errorMessage(error)}`;
        this.logger.error(`Failed to process ${message}`);
        report.errors.push(message);
        summary = SUMMARY_PLACEHOLDERS.failed;
      }

      items.push({ video, summary, hasTranscript });
      report.processed++;
    }

    return items;
  }

  private async send(digest: RenderedDigest) {
    await this.mail.sendMail(
      this.config.recipients.join(', '),
      digest.subject,
      digest.text,
      digest.html,
    );
  }
}
