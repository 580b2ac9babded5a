import { ApiProperty } from '@nestjs/swagger';

export class CreatePipelineDto {
  @ApiProperty({ example: 'frontend-app' })
  name!: string;

  @ApiProperty({
    example: 'example/frontend-app',
    description: 'Must match the repository your git webhook sends (owner/repo)',
  })
  repository!: string;

  @ApiProperty({
    description:
      'Pipeline definition as YAML text, or the same structure as a JSON object. Validated before it is stored.',
    example: 'name: ci\non:\n  push:\n    branches: [main]\njobs:\n  test:\n    steps:\n      - run: npm test\n',
  })
  definition!: string | Record<string, unknown>;
}
