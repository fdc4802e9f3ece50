import { Module } from '@nestjs/common';
import { RunsController } from './runs.controller';
import { RunsService } from './runs.service';
import { PipelinesModule } from '../pipelines/pipelines.module';
import { EngineModule } from '../../engine/engine.module';
import { StreamingModule } from '../../streaming/streaming.module';

@Module({
  imports: [PipelinesModule, EngineModule, StreamingModule],
  controllers: [RunsController],
  providers: [RunsService],
  exports: [RunsService],
})
export class RunsModule {}
