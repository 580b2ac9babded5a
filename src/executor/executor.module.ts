import { Module } from '@nestjs/common';
import { OrchestratorConfig, orchestratorConfig } from '../config/orchestrator.config';
import { StatusModule } from '../status/status.module';
import { StoreModule } from '../store/store.module';
import { CommandRunner, ShellCommandRunner } from './command-runner';
import { RunnerPool } from './runner-pool';
import { StepExecutorService } from './step-executor.service';

@Module({
  imports: [StatusModule, StoreModule],
  providers: [
    StepExecutorService,
    { provide: CommandRunner, useClass: ShellCommandRunner },
    {
      provide: RunnerPool,
      useFactory: (config: OrchestratorConfig) =>
        RunnerPool.create(config.runnerPoolSize, config.runnerWorkRoot),
      inject: [orchestratorConfig.KEY],
    },
  ],
  exports: [StepExecutorService, RunnerPool],
})
export class ExecutorModule {}
