import { ApiProperty } from '@nestjs/swagger';

export class ValidateDefinitionDto {
  @ApiProperty({ description: 'Pipeline definition (YAML text or JSON object)' })
  definition!: string | Record<string, unknown>;
}
