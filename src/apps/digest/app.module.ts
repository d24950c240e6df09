import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { loadEnv } from '@/shared/config/load-env';
import { validationSchema } from '@/shared/config/env.validation';
import { PipelineConfigModule } from '@/shared/config/pipeline-config.module';
import { DigestModule } from '@/shared/digest/digest.module';

loadEnv();

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema,
      ignoreEnvFile: true,
    }),
    ScheduleModule.forRoot(),
    PipelineConfigModule,
    DigestModule,
  ],
})
export class DigestAppModule {}
