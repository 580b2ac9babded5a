import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { parseBody, toHttpException } from '../../common/http-errors';
import { RunQueryDto } from '../../dto/run-query.dto';
import { TriggerRunDto } from '../../dto/trigger-run.dto';
import { RunsService, runQuerySchema, triggerRunSchema } from './runs.service';

@ApiTags('runs')
@Controller('runs')
export class RunsController {
  constructor(private readonly runsService: RunsService) {}

  @Get()
  @ApiOperation({ summary: 'List runs, newest first' })
  async findAll(@Query() query: RunQueryDto) {
    return this.runsService.findAll(parseBody(runQuerySchema, query));
  }

  // Static routes must be declared before :id routes
  @Get('queue')
  @ApiOperation({ summary: 'Queued and running runs, limits and runner pool usage' })
  queue() {
    return this.runsService.queue();
  }

  @Get(':id/jobs/:jobId/logs')
  @ApiOperation({ summary: 'Get log lines for a job' })
  @ApiQuery({ name: 'step', required: false, description: 'Only this step index' })
  async getJobLogs(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('jobId', ParseUUIDPipe) jobId: string,
    @Query('step', new ParseIntPipe({ optional: true })) step?: number,
  ) {
    try {
      return await this.runsService.getJobLogs(id, jobId, step);
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one run with its jobs and step results' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    try {
      return await this.runsService.findOne(id);
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Trigger a pipeline run (manual)' })
  async trigger(@Body() dto: TriggerRunDto) {
    const input = parseBody(triggerRunSchema, dto);
    try {
      return await this.runsService.trigger(input);
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Cancel a queued or running run' })
  async cancel(@Param('id', ParseUUIDPipe) id: string) {
    try {
      return await this.runsService.cancel(id);
    } catch (err) {
      throw toHttpException(err);
    }
  }
}
