import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { buildPipelineConfig, PIPELINE_CONFIG } from './pipeline.config';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: PIPELINE_CONFIG,
      useFactory: (configService: ConfigService) =>
        buildPipelineConfig(configService),
      inject: [ConfigService],
    },
  ],
  exports: [PIPELINE_CONFIG],
})
export class PipelineConfigModule {}
