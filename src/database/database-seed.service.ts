import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { DeclarationService } from '../declaration/declaration.service';
import { Pipeline } from './entities/pipeline.entity';
import { RUST_CI_SEED } from './seed/pipeline.seed';

/**
 * Runs seed data on app startup. Inserts the example pipeline only if the pipelines table is empty.
 */
@Injectable()
export class DatabaseSeedService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseSeedService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly declarations: DeclarationService,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.seedPipelinesIfEmpty();
  }

  private async seedPipelinesIfEmpty(): Promise<void> {
    const repo = this.dataSource.getRepository(Pipeline);
    const count = await repo.count();
    if (count > 0) return;

    const pipeline = repo.create({
      name: RUST_CI_SEED.name,
      repository: RUST_CI_SEED.repository,
      declaration: this.declarations.serialize(RUST_CI_SEED.pipeline),
    });
    await repo.save(pipeline);
    this.logger.log(`Seeded pipeline ${pipeline.name}`);
  }
}
