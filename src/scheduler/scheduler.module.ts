import { Module } from '@nestjs/common';
import { DefinitionsModule } from '../definitions/definitions.module';
import { ExecutorModule } from '../executor/executor.module';
import { StatusModule } from '../status/status.module';
import { StoreModule } from '../store/store.module';
import { SchedulerService } from './scheduler.service';

@Module({
  imports: [DefinitionsModule, ExecutorModule, StatusModule, StoreModule],
  providers: [SchedulerService],
  exports: [SchedulerService],
})
export class SchedulerModule {}
