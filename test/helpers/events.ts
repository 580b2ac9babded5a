import { randomUUID } from 'node:crypto';
import type { JobExecution } from '../../src/domain/run';
import type { TriggerEvent } from '../../src/domain/trigger-event';

export function pushEvent(overrides: Partial<TriggerEvent> = {}): TriggerEvent {
  return {
    repository: 'acme/app',
    branch: 'main',
    commitSha: 'c0ffee0000000000000000000000000000000001',
    eventType: 'push',
    receivedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function queuedJob(jobKey = 'build', runId: string = randomUUID()): JobExecution {
  return { id: randomUUID(), runId, jobKey, jobName: jobKey, status: 'queued', steps: [] };
}
