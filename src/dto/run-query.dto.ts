import { ApiPropertyOptional } from '@nestjs/swagger';

export class RunQueryDto {
  @ApiPropertyOptional()
  pipelineId?: string;

  @ApiPropertyOptional({ example: 'example/frontend-app' })
  repository?: string;

  @ApiPropertyOptional({ example: 'main' })
  branch?: string;

  @ApiPropertyOptional({ enum: ['queued', 'running', 'succeeded', 'failed', 'cancelled'] })
  status?: string;

  @ApiPropertyOptional({ description: 'At most 100', example: 50 })
  limit?: string;
}
