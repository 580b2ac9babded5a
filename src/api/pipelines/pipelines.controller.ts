import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { DefinitionInvalidError } from '../../common/errors';
import { parseBody, toHttpException } from '../../common/http-errors';
import { CreatePipelineDto } from '../../dto/create-pipeline.dto';
import { UpdatePipelineDto } from '../../dto/update-pipeline.dto';
import { ValidateDefinitionDto } from '../../dto/validate-definition.dto';
import {
  PipelinesService,
  createPipelineSchema,
  updatePipelineSchema,
  validateDefinitionSchema,
} from './pipelines.service';

@ApiTags('pipelines')
@Controller('pipelines')
export class PipelinesController {
  constructor(private readonly pipelinesService: PipelinesService) {}

  @Get()
  @ApiOperation({ summary: 'List pipelines' })
  async findAll() {
    return this.pipelinesService.findAll();
  }

  // Must be declared before :id routes
  @Post('validate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Validate a definition without storing it' })
  validate(@Body() dto: ValidateDefinitionDto) {
    const { definition } = parseBody(validateDefinitionSchema, dto);
    try {
      return { valid: true, definition: this.pipelinesService.validate(definition) };
    } catch (err) {
      if (err instanceof DefinitionInvalidError) {
        return { valid: false, kind: err.kind, message: err.message, issues: err.issues };
      }
      throw err;
    }
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one pipeline' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    try {
      return await this.pipelinesService.findOne(id);
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Post()
  @ApiOperation({ summary: 'Create a pipeline (definition is validated first)' })
  async create(@Body() dto: CreatePipelineDto) {
    const input = parseBody(createPipelineSchema, dto);
    try {
      return await this.pipelinesService.create(input);
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a pipeline' })
  async update(@Param('id', ParseUUIDPipe) id: string, @Body() dto: UpdatePipelineDto) {
    const input = parseBody(updatePipelineSchema, dto);
    try {
      return await this.pipelinesService.update(id, input);
    } catch (err) {
      throw toHttpException(err);
    }
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a pipeline' })
  async remove(@Param('id', ParseUUIDPipe) id: string) {
    try {
      await this.pipelinesService.remove(id);
    } catch (err) {
      throw toHttpException(err);
    }
  }
}
