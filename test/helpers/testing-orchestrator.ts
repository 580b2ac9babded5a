import { Test, TestingModule } from '@nestjs/testing';
import { randomUUID } from 'node:crypto';
import { rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  OrchestratorConfig,
  orchestratorConfig,
  parseOrchestratorConfig,
} from '../../src/config/orchestrator.config';
import { DefinitionStoreService } from '../../src/definitions/definition-store.service';
import { CommandRunner } from '../../src/executor/command-runner';
import { RunnerPool } from '../../src/executor/runner-pool';
import { StepExecutorService } from '../../src/executor/step-executor.service';
import { SchedulerService } from '../../src/scheduler/scheduler.service';
import { StatusReporterService } from '../../src/status/status-reporter.service';
import { WebhookOutboxService } from '../../src/status/webhook-outbox.service';
import { RunStore } from '../../src/store/run-store';
import { InMemoryRunStore } from '../fakes/in-memory-run.store';
import { ScriptedCommand, ScriptedCommandRunner } from '../fakes/scripted-command.runner';

/** Defaults with fast retries and a throwaway work root. */
export function testConfig(overrides: Partial<OrchestratorConfig> = {}): OrchestratorConfig {
  return {
    ...parseOrchestratorConfig({}),
    runnerWorkRoot: join(tmpdir(), 'ci-orchestrator-test', randomUUID()),
    infraRetryBaseMs: 1,
    killGraceMs: 50,
    ...overrides,
  };
}

export interface TestingOrchestrator {
  module: TestingModule;
  config: OrchestratorConfig;
  scheduler: SchedulerService;
  executor: StepExecutorService;
  reporter: StatusReporterService;
  definitions: DefinitionStoreService;
  pool: RunnerPool;
  store: InMemoryRunStore;
  commands: ScriptedCommandRunner;
  outbox: { enqueue: jest.Mock };
  close(): Promise<void>;
}

/**
 * Scheduler, executor and reporter wired as in the app, with the database, the
 * shell and the notification outbox replaced by in-process stand-ins.
 */
export async function createTestingOrchestrator(options: {
  config?: Partial<OrchestratorConfig>;
  script?: (command: string) => ScriptedCommand;
} = {}): Promise<TestingOrchestrator> {
  const config = testConfig(options.config);
  const store = new InMemoryRunStore();
  const commands = new ScriptedCommandRunner(options.script);
  const pool = RunnerPool.create(config.runnerPoolSize, config.runnerWorkRoot);
  const outbox = { enqueue: jest.fn().mockResolvedValue(undefined) };

  const module = await Test.createTestingModule({
    providers: [
      SchedulerService,
      StepExecutorService,
      StatusReporterService,
      DefinitionStoreService,
      { provide: orchestratorConfig.KEY, useValue: config },
      { provide: RunStore, useValue: store },
      { provide: CommandRunner, useValue: commands },
      { provide: RunnerPool, useValue: pool },
      { provide: WebhookOutboxService, useValue: outbox },
    ],
  }).compile();

  return {
    module,
    config,
    scheduler: module.get(SchedulerService),
    executor: module.get(StepExecutorService),
    reporter: module.get(StatusReporterService),
    definitions: module.get(DefinitionStoreService),
    pool,
    store,
    commands,
    outbox,
    close: async () => {
      await module.close();
      await rm(config.runnerWorkRoot, { recursive: true, force: true });
    },
  };
}
