import { Module } from '@nestjs/common';
import { IntakeModule } from '../../intake/intake.module';
import { SchedulerModule } from '../../scheduler/scheduler.module';
import { StoreModule } from '../../store/store.module';
import { RunsController } from './runs.controller';
import { RunsService } from './runs.service';

@Module({
  imports: [IntakeModule, SchedulerModule, StoreModule],
  controllers: [RunsController],
  providers: [RunsService],
})
export class RunsModule {}
