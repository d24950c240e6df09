import { Module } from '@nestjs/common';
import {
  PIPELINE_CONFIG,
  PipelineConfig,
} from '@/shared/config/pipeline.config';
import { VideoCatalogService } from './services/video-catalog.service';

@Module({
  providers: [
    {
      provide: VideoCatalogService,
      useFactory: (config: PipelineConfig) =>
        new VideoCatalogService(config.catalog),
      inject: [PIPELINE_CONFIG],
    },
  ],
  exports: [VideoCatalogService],
})
export class YoutubeModule {}
