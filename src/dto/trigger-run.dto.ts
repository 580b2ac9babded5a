import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class TriggerRunDto {
  @ApiProperty({ description: 'Pipeline id to run' })
  pipelineId!: string;

  @ApiProperty({ example: 'main' })
  branch!: string;

  @ApiProperty({ example: '3f786850e387550fdab836ed7e6dc881de23001b' })
  commitSha!: string;

  @ApiPropertyOptional({ description: 'Who triggered the run', example: 'alice' })
  sender?: string;

  @ApiPropertyOptional({ example: 'Re-run after flaky test' })
  message?: string;
}
