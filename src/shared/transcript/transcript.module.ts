import { Module } from '@nestjs/common';
import { ProxyModule } from '@/shared/proxy/proxy.module';
import { ProxyPoolService } from '@/shared/proxy/services/proxy-pool.service';
import { CLOCK, Clock } from '@/shared/lib/clock';
import {
  PIPELINE_CONFIG,
  PipelineConfig,
} from '@/shared/config/pipeline.config';
import { YoutubeTranscriptClient } from './clients/youtube-transcript.client';
import { TranscriptCacheService } from './services/transcript-cache.service';
import { RetryPolicyService } from './services/retry-policy.service';
import { TranscriptFetcherService } from './services/transcript-fetcher.service';
import {
  ITranscriptClient,
  TRANSCRIPT_CLIENT,
} from './interfaces/transcript.interface';

@Module({
  imports: [ProxyModule],
  providers: [
    {
      provide: TRANSCRIPT_CLIENT,
      useFactory: (config: PipelineConfig, clock: Clock) =>
        new YoutubeTranscriptClient(config.client, clock),
      inject: [PIPELINE_CONFIG, CLOCK],
    },
    {
      provide: TranscriptCacheService,
      useFactory: (config: PipelineConfig, clock: Clock) =>
        new TranscriptCacheService(config.cache, clock),
      inject: [PIPELINE_CONFIG, CLOCK],
    },
    {
      provide: RetryPolicyService,
      useFactory: (config: PipelineConfig) =>
        new RetryPolicyService(config.retry),
      inject: [PIPELINE_CONFIG],
    },
    {
      provide: TranscriptFetcherService,
      useFactory: (
        config: PipelineConfig,
        client: ITranscriptClient,
        proxyPool: ProxyPoolService,
        cache: TranscriptCacheService,
        retryPolicy: RetryPolicyService,
        clock: Clock,
      ) =>
        new TranscriptFetcherService(
          config.fetcher,
          client,
          proxyPool,
          cache,
          retryPolicy,
          clock,
        ),
      inject: [
        PIPELINE_CONFIG,
        TRANSCRIPT_CLIENT,
        ProxyPoolService,
        TranscriptCacheService,
        RetryPolicyService,
        CLOCK,
      ],
    },
  ],
  exports: [TranscriptFetcherService, TranscriptCacheService, ProxyModule],
})
export class TranscriptModule {}
