import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Pipeline, PipelineRun, JobRun, JobLog, CacheEntry } from './entities';
import { DatabaseSeedService } from './database-seed.service';
import { DeclarationModule } from '../declaration/declaration.module';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService) => ({
        type: 'postgres',
        url: config.getOrThrow<string>('DATABASE_URL'),
        entities: [Pipeline, PipelineRun, JobRun, JobLog, CacheEntry],
        // Only one process should synchronize the database (SYNC_DATABASE=false elsewhere)
        synchronize: config.get('SYNC_DATABASE') !== 'false',
      }),
      inject: [ConfigService],
    }),
    DeclarationModule,
  ],
  providers: [DatabaseSeedService],
})
export class DatabaseModule {}
