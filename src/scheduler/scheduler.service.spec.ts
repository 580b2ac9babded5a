import {
  ConcurrencyExceededError,
  InfrastructureError,
  TriggerNotMatchedError,
  ValidationError,
} from '../common/errors';
import type { OrchestratorConfig } from '../config/orchestrator.config';
import type { Run } from '../domain/run';
import type { StatusUpdate } from '../status/status-reporter.service';
import { ScriptedCommand, deferred } from '../../test/fakes/scripted-command.runner';
import { pushEvent } from '../../test/helpers/events';
import {
  TestingOrchestrator,
  createTestingOrchestrator,
} from '../../test/helpers/testing-orchestrator';

const SINGLE_JOB = { jobs: { build: { steps: [{ run: 'make' }] } } };

/** Step command that carries the commit, so scripts can tell runs apart. */
const PER_COMMIT = { jobs: { build: { steps: [{ run: 'build ${{ env.CI_COMMIT_SHA }}' }] } } };

describe('SchedulerService', () => {
  let orchestrator: TestingOrchestrator;

  async function setup(
    script: (command: string) => ScriptedCommand = () => ({}),
    config: Partial<OrchestratorConfig> = {},
  ): Promise<TestingOrchestrator> {
    orchestrator = await createTestingOrchestrator({ script, config });
    return orchestrator;
  }

  async function settledRun(runId: string): Promise<Run> {
    const run = await orchestrator.scheduler.settled(runId);
    if (!run) throw new Error(`run ${runId} not found`);
    return run;
  }

  afterEach(async () => {
    await orchestrator.close();
  });

  describe('submit', () => {
    it('runs a pipeline to success and persists the outcome', async () => {
      const { scheduler, store } = await setup();

      const runId = await scheduler.submit(pushEvent(), SINGLE_JOB, { id: null, name: 'app-ci' });
      const run = await settledRun(runId);

      expect(run.status).toBe('succeeded');
      expect(run.pipelineName).toBe('app-ci');
      expect(run.jobs.map((j) => j.status)).toEqual(['succeeded']);

      const stored = await store.findRun(runId);
      expect(stored?.status).toBe('succeeded');
      expect(stored?.startedAt).toBeInstanceOf(Date);
      expect(stored?.jobs[0].steps.map((s) => s.status)).toEqual(['succeeded']);
    });

    it('fails the run at the first failing step', async () => {
      const { scheduler, commands } = await setup((command) =>
        command === 'exit 1' ? { exitCode: 1 } : {},
      );

      const runId = await scheduler.submit(pushEvent(), {
        jobs: { build: { steps: [{ run: 'echo ok' }, { run: 'exit 1' }, { run: 'echo never' }] } },
      });
      const run = await settledRun(runId);

      expect(run.status).toBe('failed');
      expect(run.reason).toBe('exit_code');
      expect(run.jobs[0].steps).toHaveLength(2);
      expect(commands.commands()).toEqual(['echo ok', 'exit 1']);
    });

    it('publishes run transitions in order', async () => {
      const { scheduler, reporter } = await setup();
      const updates: StatusUpdate[] = [];
      const subscription = reporter.statusUpdates().subscribe((u) => updates.push(u));

      const runId = await scheduler.submit(pushEvent(), SINGLE_JOB);
      await settledRun(runId);
      subscription.unsubscribe();

      expect(updates.filter((u) => u.scope === 'run').map((u) => u.status)).toEqual([
        'queued',
        'running',
        'succeeded',
      ]);
      expect(updates.filter((u) => u.scope === 'job').map((u) => u.status)).toEqual([
        'running',
        'succeeded',
      ]);
    });

    it('rejects an invalid definition without creating a run', async () => {
      const { scheduler, store } = await setup();

      await expect(scheduler.submit(pushEvent(), { jobs: {} })).rejects.toBeInstanceOf(ValidationError);
      expect(store.runs.size).toBe(0);
    });

    it('accepts a definition already loaded by the store', async () => {
      const { scheduler, definitions } = await setup();
      const definition = definitions.load('jobs:\n  build:\n    steps:\n      - run: make\n');

      const run = await settledRun(await scheduler.submit(pushEvent(), definition));
      expect(run.status).toBe('succeeded');
    });

    it('reports an infrastructure error when the run cannot be recorded', async () => {
      const { scheduler, store } = await setup();
      store.failCreates = 1;

      await expect(scheduler.submit(pushEvent(), SINGLE_JOB)).rejects.toBeInstanceOf(InfrastructureError);
      expect(scheduler.snapshot().queued).toEqual([]);
      expect(scheduler.snapshot().running).toEqual([]);
    });
  });

  describe('trigger matching', () => {
    const FILTERED = {
      on: { push: { branches: ['main'] }, pull_request: { branches: ['main'] } },
      jobs: { build: { steps: [{ run: 'make' }] } },
    };

    it('rejects events whose branch the pipeline does not run for', async () => {
      const { scheduler } = await setup();
      await expect(scheduler.submit(pushEvent({ branch: 'dev' }), FILTERED)).rejects.toBeInstanceOf(
        TriggerNotMatchedError,
      );
    });

    it('rejects event types the pipeline does not list', async () => {
      const { scheduler } = await setup();
      const pushOnly = { on: ['push'], jobs: SINGLE_JOB.jobs };
      await expect(
        scheduler.submit(pushEvent({ eventType: 'pull_request', baseBranch: 'main' }), pushOnly),
      ).rejects.toBeInstanceOf(TriggerNotMatchedError);
    });

    it('matches pull requests against their target branch', async () => {
      const { scheduler } = await setup();
      const event = pushEvent({ branch: 'feature/x', eventType: 'pull_request', baseBranch: 'main' });

      const run = await settledRun(await scheduler.submit(event, FILTERED));
      expect(run.status).toBe('succeeded');
    });

    it('runs manual triggers whatever the trigger section says', async () => {
      const { scheduler } = await setup();
      const event = pushEvent({ branch: 'dev', eventType: 'manual' });

      const run = await settledRun(await scheduler.submit(event, FILTERED));
      expect(run.status).toBe('succeeded');
    });

    it('admits only jobs whose branch filter matches and drops edges to the others', async () => {
      const { scheduler, commands } = await setup();
      const definition = {
        jobs: {
          deploy: { branches: ['main'], steps: [{ run: 'deploy' }] },
          smoke: { needs: ['deploy'], steps: [{ run: 'smoke' }] },
        },
      };

      const run = await settledRun(await scheduler.submit(pushEvent({ branch: 'dev' }), definition));

      expect(run.jobs.map((j) => j.jobKey)).toEqual(['smoke']);
      expect(run.status).toBe('succeeded');
      expect(commands.commands()).toEqual(['smoke']);
    });

    it('rejects events for which no job is admitted', async () => {
      const { scheduler } = await setup();
      const definition = { jobs: { deploy: { branches: ['main'], steps: [{ run: 'deploy' }] } } };

      await expect(scheduler.submit(pushEvent({ branch: 'dev' }), definition)).rejects.toBeInstanceOf(
        TriggerNotMatchedError,
      );
    });
  });

  describe('job graph', () => {
    it('starts a job only after the jobs it needs succeeded', async () => {
      const { scheduler, commands } = await setup();
      const definition = {
        jobs: {
          test: { needs: ['build'], steps: [{ run: 'make test' }] },
          build: { steps: [{ run: 'make' }] },
        },
      };

      const run = await settledRun(await scheduler.submit(pushEvent(), definition));

      expect(run.status).toBe('succeeded');
      expect(commands.commands()).toEqual(['make', 'make test']);
    });

    it('cancels jobs downstream of a failure without running them', async () => {
      const { scheduler, commands } = await setup((command) =>
        command === 'make' ? { exitCode: 2 } : {},
      );
      const definition = {
        jobs: {
          build: { steps: [{ run: 'make' }] },
          test: { needs: ['build'], steps: [{ run: 'make test' }] },
          publish: { needs: ['test'], steps: [{ run: 'publish' }] },
        },
      };

      const run = await settledRun(await scheduler.submit(pushEvent(), definition));

      expect(run.status).toBe('failed');
      expect(run.reason).toBe('exit_code');
      expect(run.jobs.map((j) => [j.jobKey, j.status, j.reason])).toEqual([
        ['build', 'failed', 'exit_code'],
        ['test', 'cancelled', 'upstream_failed'],
        ['publish', 'cancelled', 'upstream_failed'],
      ]);
      expect(commands.commands()).toEqual(['make']);
    });

    it('runs independent jobs in parallel', async () => {
      const gate = deferred();
      const { scheduler, pool } = await setup(() => ({ until: gate.promise }));
      const definition = {
        jobs: {
          lint: { steps: [{ run: 'lint' }] },
          unit: { steps: [{ run: 'unit' }] },
        },
      };

      const runId = await scheduler.submit(pushEvent(), definition);
      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(pool.stats().available).toBe(pool.stats().size - 2);

      gate.resolve();
      expect((await settledRun(runId)).status).toBe('succeeded');
    });
  });

  describe('concurrency', () => {
    it('holds runs beyond the global limit in the queue, oldest first', async () => {
      const gate = deferred();
      const { scheduler, reporter } = await setup(() => ({ until: gate.promise }), {
        maxConcurrentRuns: 1,
      });
      const started: string[] = [];
      const subscription = reporter.statusUpdates().subscribe((u) => {
        if (u.scope === 'run' && u.status !== 'queued') started.push(`${u.runId}:${u.status}`);
      });

      const first = await scheduler.submit(pushEvent({ branch: 'a' }), SINGLE_JOB);
      const second = await scheduler.submit(pushEvent({ branch: 'b' }), SINGLE_JOB);

      const snapshot = scheduler.snapshot();
      expect(snapshot.running.map((r) => r.runId)).toEqual([first]);
      expect(snapshot.queued.map((r) => r.runId)).toEqual([second]);

      gate.resolve();
      await settledRun(second);
      subscription.unsubscribe();

      expect(started).toEqual([
        `${first}:running`,
        `${first}:succeeded`,
        `${second}:running`,
        `${second}:succeeded`,
      ]);
    });

    it('limits runs per branch while other branches proceed', async () => {
      const gate = deferred();
      const { scheduler } = await setup(() => ({ until: gate.promise }), {
        perBranchConcurrency: 1,
        supersedeOnPush: false,
      });

      const mainFirst = await scheduler.submit(pushEvent({ commitSha: 'sha-1' }), SINGLE_JOB);
      const mainSecond = await scheduler.submit(pushEvent({ commitSha: 'sha-2' }), SINGLE_JOB);
      const other = await scheduler.submit(pushEvent({ branch: 'dev' }), SINGLE_JOB);

      const snapshot = scheduler.snapshot();
      expect(snapshot.running.map((r) => r.runId)).toEqual([mainFirst, other]);
      expect(snapshot.queued.map((r) => r.runId)).toEqual([mainSecond]);

      gate.resolve();
      expect((await settledRun(mainSecond)).status).toBe('succeeded');
    });

    it('rejects a run when the branch queue is full', async () => {
      const gate = deferred();
      const { scheduler } = await setup(() => ({ until: gate.promise }), {
        perBranchConcurrency: 1,
        perBranchQueueLimit: 1,
        supersedeOnPush: false,
      });

      await scheduler.submit(pushEvent({ commitSha: 'sha-1' }), SINGLE_JOB);
      await scheduler.submit(pushEvent({ commitSha: 'sha-2' }), SINGLE_JOB);

      const rejected = scheduler.submit(pushEvent({ commitSha: 'sha-3' }), SINGLE_JOB);
      await expect(rejected).rejects.toBeInstanceOf(ConcurrencyExceededError);
      await expect(rejected).rejects.toMatchObject({ branchKey: 'acme/app#main', limit: 1, retryable: true });

      gate.resolve();
    });
  });

  describe('supersede', () => {
    it('cancels the older run of a branch when a newer push arrives', async () => {
      const { scheduler, commands } = await setup((command) =>
        command === 'build sha-1' ? { hang: true } : {},
      );

      const older = await scheduler.submit(pushEvent({ commitSha: 'sha-1' }), PER_COMMIT);
      const newer = await scheduler.submit(pushEvent({ commitSha: 'sha-2' }), PER_COMMIT);

      const olderRun = await settledRun(older);
      const newerRun = await settledRun(newer);

      expect(olderRun.status).toBe('cancelled');
      expect(olderRun.reason).toBe('superseded');
      expect(newerRun.status).toBe('succeeded');
      expect(commands.commands()).toEqual(['build sha-1', 'build sha-2']);
    });

    it('cancels a superseded run that was still queued without running it', async () => {
      const gate = deferred();
      const { scheduler, commands } = await setup(
        (command) => (command === 'build sha-0' ? { until: gate.promise } : {}),
        { maxConcurrentRuns: 1 },
      );

      const blocker = await scheduler.submit(pushEvent({ branch: 'other', commitSha: 'sha-0' }), PER_COMMIT);
      const older = await scheduler.submit(pushEvent({ commitSha: 'sha-1' }), PER_COMMIT);
      const newer = await scheduler.submit(pushEvent({ commitSha: 'sha-2' }), PER_COMMIT);

      const olderRun = await settledRun(older);
      expect(olderRun.status).toBe('cancelled');
      expect(olderRun.jobs.map((j) => [j.status, j.reason])).toEqual([['cancelled', 'superseded']]);

      gate.resolve();
      await settledRun(blocker);
      expect((await settledRun(newer)).status).toBe('succeeded');
      expect(commands.commands()).toEqual(['build sha-0', 'build sha-2']);
    });

    it('keeps the runs of every pipeline triggered by the same push', async () => {
      const gate = deferred();
      const { scheduler } = await setup(() => ({ until: gate.promise }), { perBranchConcurrency: 2 });
      const push = pushEvent({ commitSha: 'sha-1' });

      const web = await scheduler.submit(push, { jobs: { web: { steps: [{ run: 'make web' }] } } });
      const docs = await scheduler.submit(push, { jobs: { docs: { steps: [{ run: 'make docs' }] } } });
      gate.resolve();

      expect((await settledRun(web)).status).toBe('succeeded');
      expect((await settledRun(docs)).status).toBe('succeeded');
    });

    it('supersedes every pipeline of the previous push', async () => {
      const { scheduler } = await setup(
        (command) => (command.endsWith('sha-1') ? { hang: true } : {}),
        { perBranchConcurrency: 2 },
      );
      const web = { jobs: { web: { steps: [{ run: 'web ${{ env.CI_COMMIT_SHA }}' }] } } };
      const docs = { jobs: { docs: { steps: [{ run: 'docs ${{ env.CI_COMMIT_SHA }}' }] } } };
      const first = pushEvent({ commitSha: 'sha-1' });
      const second = pushEvent({ commitSha: 'sha-2', receivedAt: new Date('2026-01-01T00:01:00Z') });

      const older = [await scheduler.submit(first, web), await scheduler.submit(first, docs)];
      const newer = [await scheduler.submit(second, web), await scheduler.submit(second, docs)];

      for (const runId of older) {
        expect((await settledRun(runId)).reason).toBe('superseded');
      }
      for (const runId of newer) {
        expect((await settledRun(runId)).status).toBe('succeeded');
      }
    });

    it('does not supersede on pull request events', async () => {
      const gate = deferred();
      const { scheduler } = await setup(() => ({ until: gate.promise }));
      const event = { eventType: 'pull_request' as const, baseBranch: 'main' };

      const first = await scheduler.submit(pushEvent({ ...event, commitSha: 'sha-1' }), SINGLE_JOB);
      const second = await scheduler.submit(pushEvent({ ...event, commitSha: 'sha-2' }), SINGLE_JOB);

      gate.resolve();
      expect((await settledRun(first)).status).toBe('succeeded');
      expect((await settledRun(second)).status).toBe('succeeded');
    });

    it('leaves other branches alone', async () => {
      const gate = deferred();
      const { scheduler } = await setup(() => ({ until: gate.promise }));

      const main = await scheduler.submit(pushEvent({ commitSha: 'sha-1' }), SINGLE_JOB);
      const dev = await scheduler.submit(pushEvent({ branch: 'dev', commitSha: 'sha-2' }), SINGLE_JOB);

      gate.resolve();
      expect((await settledRun(main)).status).toBe('succeeded');
      expect((await settledRun(dev)).status).toBe('succeeded');
    });
  });

  describe('cancel', () => {
    it('terminates a running run', async () => {
      const { scheduler, store } = await setup(() => ({ hang: true }));
      const runId = await scheduler.submit(pushEvent(), {
        jobs: { build: { steps: [{ run: 'sleep' }, { run: 'after' }] } },
      });

      expect(scheduler.cancel(runId)).toBe(true);
      const run = await settledRun(runId);

      expect(run.status).toBe('cancelled');
      expect(run.reason).toBe('cancelled');
      expect(run.jobs[0].status).toBe('cancelled');
      expect((await store.findRun(runId))?.status).toBe('cancelled');
    });

    it('returns false for finished and unknown runs', async () => {
      const { scheduler } = await setup();
      const runId = await scheduler.submit(pushEvent(), SINGLE_JOB);
      await settledRun(runId);

      expect(scheduler.cancel(runId)).toBe(false);
      expect(scheduler.cancel('00000000-0000-4000-8000-000000000000')).toBe(false);
    });

    it('cancels a queued run before it starts', async () => {
      const gate = deferred();
      const { scheduler, commands } = await setup(
        (command) => (command === 'build sha-1' ? { until: gate.promise } : {}),
        { maxConcurrentRuns: 1 },
      );

      const running = await scheduler.submit(pushEvent({ commitSha: 'sha-1' }), PER_COMMIT);
      const queued = await scheduler.submit(pushEvent({ branch: 'dev', commitSha: 'sha-2' }), PER_COMMIT);

      expect(scheduler.cancel(queued)).toBe(true);
      const run = await settledRun(queued);
      expect(run.status).toBe('cancelled');
      expect(run.startedAt).toBeUndefined();

      gate.resolve();
      await settledRun(running);
      expect(commands.commands()).toEqual(['build sha-1']);
    });
  });

  describe('recovery', () => {
    it('marks runs left over by a previous process as interrupted', async () => {
      const { scheduler, store } = await setup();
      const leftover: Run = {
        id: 'f5b7c1de-0000-4000-8000-000000000001',
        pipelineId: null,
        pipelineName: 'ci',
        trigger: pushEvent(),
        status: 'running',
        jobs: [],
        createdAt: new Date('2026-01-01T00:00:00Z'),
      };
      await store.createRun(leftover);

      await scheduler.onModuleInit();

      const stored = await store.findRun(leftover.id);
      expect(stored?.status).toBe('failed');
      expect(stored?.reason).toBe('interrupted');
    });
  });

  describe('shutdown', () => {
    it('cancels live runs and clears the grace timer once they settle', async () => {
      const { scheduler, commands } = await setup(() => ({ hang: true }));
      const runId = await scheduler.submit(pushEvent(), SINGLE_JOB);
      while (commands.calls.length === 0) await new Promise((resolve) => setImmediate(resolve));

      const setTimer = jest.spyOn(global, 'setTimeout');
      const clearTimer = jest.spyOn(global, 'clearTimeout');
      try {
        await scheduler.onModuleDestroy();

        const graceIndex = setTimer.mock.calls.findIndex(([, ms]) => ms === 10_000);
        expect(graceIndex).toBeGreaterThanOrEqual(0);
        expect(clearTimer).toHaveBeenCalledWith(setTimer.mock.results[graceIndex].value);
      } finally {
        setTimer.mockRestore();
        clearTimer.mockRestore();
      }
      expect((await settledRun(runId)).status).toBe('cancelled');
    });
  });
});
