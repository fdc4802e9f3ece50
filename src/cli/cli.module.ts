import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { engineConfig } from '../config/engine.config';
import { EngineModule } from '../engine/engine.module';
import { StreamingModule } from '../streaming/streaming.module';
import { CliService } from './cli.service';

/** Standalone context for the CLI: the engine without HTTP or a database. */
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, load: [engineConfig] }), EngineModule, StreamingModule],
  providers: [CliService],
})
export class CliModule {}
