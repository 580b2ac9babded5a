import { Test } from '@nestjs/testing';
import { ConcurrencyExceededError, NotFoundError, TriggerNotMatchedError } from '../common/errors';
import { PipelinesService } from '../api/pipelines/pipelines.service';
import { SchedulerService } from '../scheduler/scheduler.service';
import { pushEvent } from '../../test/helpers/events';
import { IntakeService } from './intake.service';

const WEB = {
  id: 'p-web',
  name: 'web',
  repository: 'acme/app',
  definition: 'jobs: {web: {steps: [{run: make}]}}',
};
const DOCS = {
  id: 'p-docs',
  name: 'docs',
  repository: 'acme/app',
  definition: 'jobs: {docs: {steps: [{run: mkdocs}]}}',
};

describe('IntakeService', () => {
  let intake: IntakeService;
  let pipelines: { findByRepository: jest.Mock; findOne: jest.Mock };
  let scheduler: { submit: jest.Mock };

  beforeEach(async () => {
    pipelines = { findByRepository: jest.fn(), findOne: jest.fn() };
    scheduler = { submit: jest.fn() };
    const module = await Test.createTestingModule({
      providers: [
        IntakeService,
        { provide: PipelinesService, useValue: pipelines },
        { provide: SchedulerService, useValue: scheduler },
      ],
    }).compile();
    intake = module.get(IntakeService);
  });

  it('submits one run per pipeline of the repository', async () => {
    pipelines.findByRepository.mockResolvedValue([WEB, DOCS]);
    scheduler.submit.mockResolvedValueOnce('run-1').mockResolvedValueOnce('run-2');
    const event = pushEvent();

    const result = await intake.dispatch(event);

    expect(pipelines.findByRepository).toHaveBeenCalledWith('acme/app');
    expect(scheduler.submit).toHaveBeenNthCalledWith(1, event, WEB.definition, { id: 'p-web', name: 'web' });
    expect(result).toEqual({
      runs: [
        { pipelineId: 'p-web', pipelineName: 'web', runId: 'run-1' },
        { pipelineId: 'p-docs', pipelineName: 'docs', runId: 'run-2' },
      ],
      skipped: [],
    });
  });

  it('reports pipelines that did not take the event', async () => {
    pipelines.findByRepository.mockResolvedValue([WEB, DOCS]);
    scheduler.submit
      .mockRejectedValueOnce(
        new TriggerNotMatchedError('Pipeline "web" does not run push events for branch main'),
      )
      .mockRejectedValueOnce(new ConcurrencyExceededError('acme/app#main', 5));

    const result = await intake.dispatch(pushEvent());

    expect(result.runs).toEqual([]);
    expect(result.skipped.map((s) => [s.pipelineId, s.code])).toEqual([
      ['p-web', 'TriggerNotMatched'],
      ['p-docs', 'ConcurrencyExceeded'],
    ]);
  });

  it('propagates unexpected errors', async () => {
    pipelines.findByRepository.mockResolvedValue([WEB]);
    scheduler.submit.mockRejectedValue(new TypeError('bug'));

    await expect(intake.dispatch(pushEvent())).rejects.toBeInstanceOf(TypeError);
  });

  it('fails when no pipeline is registered for the repository', async () => {
    pipelines.findByRepository.mockResolvedValue([]);
    await expect(intake.dispatch(pushEvent())).rejects.toBeInstanceOf(NotFoundError);
  });

  it('builds a manual event for an explicit trigger', async () => {
    pipelines.findOne.mockResolvedValue(WEB);
    scheduler.submit.mockResolvedValue('run-9');

    const result = await intake.triggerManual({
      pipelineId: 'p-web',
      branch: 'dev',
      commitSha: 'abc123',
      sender: 'alice',
    });

    expect(result).toEqual({ pipelineId: 'p-web', pipelineName: 'web', runId: 'run-9' });
    expect(scheduler.submit).toHaveBeenCalledWith(
      expect.objectContaining({
        repository: 'acme/app',
        branch: 'dev',
        commitSha: 'abc123',
        eventType: 'manual',
        sender: 'alice',
      }),
      WEB.definition,
      { id: 'p-web', name: 'web' },
    );
  });
});
