import { Module } from '@nestjs/common';
import { PipelinesModule } from '../api/pipelines/pipelines.module';
import { SchedulerModule } from '../scheduler/scheduler.module';
import { IntakeService } from './intake.service';

@Module({
  imports: [PipelinesModule, SchedulerModule],
  providers: [IntakeService],
  exports: [IntakeService],
})
export class IntakeModule {}
