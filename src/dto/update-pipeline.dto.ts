import { ApiPropertyOptional } from '@nestjs/swagger';

export class UpdatePipelineDto {
  @ApiPropertyOptional({ example: 'frontend-app' })
  name?: string;

  @ApiPropertyOptional({ example: 'example/frontend-app' })
  repository?: string;

  @ApiPropertyOptional({ description: 'Pipeline definition (YAML text or JSON object)' })
  definition?: string | Record<string, unknown>;
}
