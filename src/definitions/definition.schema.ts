import { z } from 'zod';

/**
 * Structural schema of a pipeline definition as authored (YAML or JSON).
 * Only shape is checked here; semantic rules (no jobs, empty job, unknown step type,
 * dependency cycles) live in the definition store so they report as ValidationError.
 */

const envValue = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));
const envMap = z.record(envValue).default({});

const stringList = z.union([z.string(), z.array(z.string())]).transform((v) =>
  Array.isArray(v) ? v : [v],
);

const branchesFilter = z
  .object({
    branches: stringList.optional(),
    'branches-ignore': stringList.optional(),
  })
  .nullable();

export const rawStepSchema = z.object({
  name: z.string().optional(),
  run: z.string().optional(),
  uses: z.string().optional(),
  env: envMap,
  'timeout-minutes': z.number().optional(),
});

export const rawJobSchema = z.object({
  name: z.string().optional(),
  steps: z.array(rawStepSchema).default([]),
  env: envMap,
  branches: stringList.optional(),
  needs: stringList.default([]),
  'timeout-minutes': z.number().optional(),
});

export const rawTriggersSchema = z.union([
  z.string().transform((e) => ({ [e]: null })),
  z
    .array(z.string())
    .transform((events) => Object.fromEntries(events.map((e): [string, null] => [e, null]))),
  z.record(branchesFilter),
]);

export const rawDefinitionSchema = z.object({
  name: z.string().optional(),
  on: rawTriggersSchema.optional(),
  env: envMap,
  jobs: z.record(rawJobSchema).default({}),
});

export type RawDefinition = z.infer<typeof rawDefinitionSchema>;
export type RawJob = z.infer<typeof rawJobSchema>;
export type RawStep = z.infer<typeof rawStepSchema>;
export type RawBranchesFilter = z.infer<typeof branchesFilter>;
