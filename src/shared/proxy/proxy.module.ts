import { Module } from '@nestjs/common';
import { ProxyPoolService } from './services/proxy-pool.service';
import { resolveProxySource } from './providers/proxy-source.factory';
import { CLOCK, Clock, SystemClock } from '@/shared/lib/clock';
import {
  PIPELINE_CONFIG,
  PipelineConfig,
} from '@/shared/config/pipeline.config';

@Module({
  providers: [
    {
      provide: CLOCK,
      useClass: SystemClock,
    },
    {
      provide: ProxyPoolService,
      useFactory: async (config: PipelineConfig, clock: Clock) => {
        const pool = new ProxyPoolService(config.proxyPool, clock);
        // Rotation off means the pool stays empty and every request goes direct
        if (config.fetcher.rotationEnabled) {
          await pool.initialize(resolveProxySource(config.proxySource));
        }
        return pool;
      },
      inject: [PIPELINE_CONFIG, CLOCK],
    },
  ],
  exports: [ProxyPoolService, CLOCK],
})
export class ProxyModule {}
