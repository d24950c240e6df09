import { Module } from '@nestjs/common';
import {
  PIPELINE_CONFIG,
  PipelineConfig,
} from '@/shared/config/pipeline.config';
import { TranscriptModule } from '@/shared/transcript/transcript.module';
import { TranscriptFetcherService } from '@/shared/transcript/services/transcript-fetcher.service';
import { TranscriptCacheService } from '@/shared/transcript/services/transcript-cache.service';
import { ProxyPoolService } from '@/shared/proxy/services/proxy-pool.service';
import { YoutubeModule } from '@/shared/youtube/youtube.module';
import { VideoCatalogService } from '@/shared/youtube/services/video-catalog.service';
import { GeminiModule } from '@/shared/gemini/gemini.module';
import { GeminiService } from '@/shared/gemini/gemini.service';
import { MailModule } from '@/shared/mail/mail.module';
import { MailService } from '@/shared/mail/mail.service';
import { CLOCK, Clock } from '@/shared/lib/clock';
import { ProcessedVideoLedger } from './services/processed-video-ledger.service';
import { DigestRunnerService } from './services/digest-runner.service';
import { DigestSchedulerService } from './services/digest-scheduler.service';

@Module({
  imports: [TranscriptModule, YoutubeModule, GeminiModule, MailModule],
  providers: [
    {
      provide: ProcessedVideoLedger,
      useFactory: (config: PipelineConfig) =>
        new ProcessedVideoLedger(config.digest.processedVideosFile),
      inject: [PIPELINE_CONFIG],
    },
    {
      provide: DigestRunnerService,
      useFactory: (
        config: PipelineConfig,
        catalog: VideoCatalogService,
        fetcher: TranscriptFetcherService,
        cache: TranscriptCacheService,
        proxyPool: ProxyPoolService,
        gemini: GeminiService,
        mail: MailService,
        ledger: ProcessedVideoLedger,
        clock: Clock,
      ) =>
        new DigestRunnerService(
          config.digest,
          catalog,
          fetcher,
          cache,
          proxyPool,
          gemini,
          mail,
          ledger,
          clock,
        ),
      inject: [
        PIPELINE_CONFIG,
        VideoCatalogService,
        TranscriptFetcherService,
        TranscriptCacheService,
        ProxyPoolService,
        GeminiService,
        MailService,
        ProcessedVideoLedger,
        CLOCK,
      ],
    },
    DigestSchedulerService,
  ],
  exports: [DigestRunnerService],
})
export class DigestModule {}
