import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  PIPELINE_CONFIG,
  pipelineConfigFactory,
} from '../config/pipeline.config';
import { SLEEP, sleep } from './sleep';

@Global()
@Module({
  providers: [
    {
      provide: PIPELINE_CONFIG,
      useFactory: pipelineConfigFactory,
      inject: [ConfigService],
    },
    { provide: SLEEP, useValue: sleep },
  ],
  exports: [PIPELINE_CONFIG, SLEEP],
})
export class CommonModule {}
