import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { z } from 'zod';
import { NotFoundError } from '../../common/errors';
import { Pipeline } from '../../database/entities/pipeline.entity';
import { DefinitionStoreService } from '../../definitions/definition-store.service';
import type { PipelineDefinition } from '../../definitions/definition.types';

const definitionInput = z.union([z.string().min(1), z.record(z.unknown())]);

export const createPipelineSchema = z.object({
  name: z.string().min(1).max(255),
  repository: z.string().min(1).max(500),
  definition: definitionInput,
});

export const updatePipelineSchema = createPipelineSchema.partial();

export const validateDefinitionSchema = z.object({ definition: definitionInput });

export type CreatePipelineInput = z.infer<typeof createPipelineSchema>;
export type UpdatePipelineInput = z.infer<typeof updatePipelineSchema>;

export interface DefinitionSummary {
  name: string;
  digest: string;
  triggers: Array<{ event: string; branches: readonly string[] | null }> | null;
  jobs: Array<{
    key: string;
    name: string;
    needs: readonly string[];
    branches: readonly string[] | null;
    steps: string[];
  }>;
}

/** Definitions are stored as authored; objects are kept as pretty JSON (which is valid YAML). */
function toDefinitionText(definition: string | Record<string, unknown>): string {
  return typeof definition === 'string' ? definition : JSON.stringify(definition, null, 2);
}

export function summarizeDefinition(definition: PipelineDefinition): DefinitionSummary {
  return {
    name: definition.name,
    digest: definition.digest,
    triggers: definition.on
      ? [...definition.on].map(([event, filter]) => ({ event, branches: filter?.patterns ?? null }))
      : null,
    jobs: definition.jobs.map((job) => ({
      key: job.key,
      name: job.name,
      needs: job.needs,
      branches: job.branches?.patterns ?? null,
      steps: job.steps.map((s) => s.name),
    })),
  };
}

@Injectable()
export class PipelinesService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly definitions: DefinitionStoreService,
  ) {}

  private get repo() {
    return this.dataSource.getRepository(Pipeline);
  }

  async findAll(): Promise<Pipeline[]> {
    return this.repo.find({ order: { created_at: 'DESC' } });
  }

  /** @throws NotFoundError */
  async findOne(id: string): Promise<Pipeline> {
    const pipeline = await this.repo.findOne({ where: { id } });
    if (!pipeline) throw new NotFoundError(`Pipeline ${id} not found`);
    return pipeline;
  }

  /** Every pipeline registered for the repository; one event may trigger several. */
  async findByRepository(repository: string): Promise<Pipeline[]> {
    return this.repo.find({ where: { repository }, order: { created_at: 'ASC' } });
  }

  /** @throws DefinitionInvalidError when the definition does not load */
  validate(definition: string | Record<string, unknown>): DefinitionSummary {
    return summarizeDefinition(this.definitions.load(definition));
  }

  async create(input: CreatePipelineInput): Promise<Pipeline> {
    const definition = toDefinitionText(input.definition);
    this.definitions.load(definition);
    const pipeline = this.repo.create({ name: input.name, repository: input.repository, definition });
    return this.repo.save(pipeline);
  }

  async update(id: string, input: UpdatePipelineInput): Promise<Pipeline> {
    const pipeline = await this.findOne(id);
    if (input.definition !== undefined) {
      const definition = toDefinitionText(input.definition);
      this.definitions.load(definition);
      pipeline.definition = definition;
    }
    if (input.name !== undefined) pipeline.name = input.name;
    if (input.repository !== undefined) pipeline.repository = input.repository;
    return this.repo.save(pipeline);
  }

  async remove(id: string): Promise<void> {
    const result = await this.repo.delete(id);
    if (result.affected === 0) throw new NotFoundError(`Pipeline ${id} not found`);
  }
}
