import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Pipeline } from './entities/pipeline.entity';
import { PIPELINE_SEED } from './seed/pipeline.seed';

/**
 * Runs seed data on app startup. Inserts example pipelines only if the pipelines table is empty.
 */
@Injectable()
export class DatabaseSeedService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseSeedService.name);

  constructor(private readonly dataSource: DataSource) {}

  async onModuleInit(): Promise<void> {
    const repo = this.dataSource.getRepository(Pipeline);
    const count = await repo.count();
    if (count > 0) return;

    for (const row of PIPELINE_SEED) {
      await repo.save(repo.create(row));
    }
    this.logger.log(`Seeded ${PIPELINE_SEED.length} example pipelines`);
  }
}
