import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { engineConfig } from './config/engine.config';
import { DatabaseModule } from './database/database.module';
import { EngineModule } from './engine/engine.module';
import { PipelinesModule } from './api/pipelines/pipelines.module';
import { RunsModule } from './api/runs/runs.module';
import { WebhooksModule } from './api/webhooks/webhooks.module';
import { StreamingModule } from './streaming/streaming.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [engineConfig] }),
    DatabaseModule,
    EngineModule,
    PipelinesModule,
    RunsModule,
    WebhooksModule,
    StreamingModule,
  ],
})
export class AppModule {}
