import { Module } from '@nestjs/common';
import { RunStore } from './run-store';
import { TypeOrmRunStore } from './typeorm-run.store';

@Module({
  providers: [{ provide: RunStore, useClass: TypeOrmRunStore }],
  exports: [RunStore],
})
export class StoreModule {}
