import { Controller, Param, ParseUUIDPipe, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { LogEvent, StatusReporterService, StatusUpdate } from './status-reporter.service';

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly reporter: StatusReporterService) {}

  /**
   * Every status transition of every run.
   */
  @Sse('status')
  @ApiOperation({ summary: 'SSE: status updates for all runs' })
  streamAllStatus(): Observable<{ data: StatusUpdate }> {
    return this.reporter.statusUpdates().pipe(map((u) => ({ data: u })));
  }

  @Sse('runs/:runId')
  @ApiOperation({ summary: 'SSE: status updates of one run' })
  streamRunStatus(
    @Param('runId', ParseUUIDPipe) runId: string,
  ): Observable<{ data: StatusUpdate }> {
    return this.reporter.statusUpdatesForRun(runId).pipe(map((u) => ({ data: u })));
  }

  /**
   * Output lines of all jobs of a run, as they are produced.
   */
  @Sse('logs/:runId')
  @ApiOperation({ summary: 'SSE: real-time step output of a run' })
  streamRunLogs(@Param('runId', ParseUUIDPipe) runId: string): Observable<{ data: LogEvent }> {
    return this.reporter.logsForRun(runId).pipe(map((ev) => ({ data: ev })));
  }
}
