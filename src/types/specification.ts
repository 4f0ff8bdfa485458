/**
 * Specification Types
 *
 * The immutable goal contract a run executes. Validated with zod and
 * frozen on creation.
 */

import { z } from 'zod';

/**
 * Kind of work the specification describes. Selects the task profile
 * (capabilities and prompt data) used for every item.
 */
export const TaskKind = {
  CODE: 'code',
  RESEARCH: 'research',
  ANALYSIS: 'analysis',
} as const;

export type TaskKind = (typeof TaskKind)[keyof typeof TaskKind];

export const ontologyFieldSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  description: z.string().default(''),
  required: z.boolean().default(true),
});

export const outputSchemaSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  fields: z.array(ontologyFieldSchema),
});

export const evaluationPrincipleSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  weight: z.number().min(0).max(1).default(1),
});

export const exitConditionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  criteria: z.string().default(''),
});

/**
 * A work item is written either as plain text or with flags that feed
 * the consensus trigger matrix.
 */
export const workItemSchema = z
  .union([
    z.string().min(1),
    z.object({
      text: z.string().min(1),
      finalDeliverable: z.boolean().default(false),
      affectsOntology: z.boolean().default(false),
    }),
  ])
  .transform((item) =>
    typeof item === 'string'
      ? { text: item, finalDeliverable: false, affectsOntology: false }
      : item
  );

export const specificationMetadataSchema = z.object({
  specId: z.string().min(1).optional(),
  version: z.string().default('1.0.0'),
  createdAt: z.string().optional(),
  ambiguityScore: z.number().min(0).max(1),
});

export const specificationSchema = z.object({
  goal: z.string().min(1),
  taskType: z.nativeEnum(TaskKind).default(TaskKind.CODE),
  constraints: z.array(z.string().min(1)).default([]),
  workItems: z.array(workItemSchema).min(1),
  outputSchema: outputSchemaSchema,
  evaluationPrinciples: z.array(evaluationPrincipleSchema).default([]),
  exitConditions: z.array(exitConditionSchema).default([]),
  metadata: specificationMetadataSchema,
});

export type SpecificationInput = z.input<typeof specificationSchema>;

export interface OntologyField {
  readonly name: string;
  readonly type: string;
  readonly description: string;
  readonly required: boolean;
}

export interface OutputSchema {
  readonly name: string;
  readonly description: string;
  readonly fields: readonly OntologyField[];
}

export interface EvaluationPrinciple {
  readonly name: string;
  readonly description: string;
  readonly weight: number;
}

export interface ExitCondition {
  readonly name: string;
  readonly description: string;
  readonly criteria: string;
}

export interface WorkItemSpec {
  readonly text: string;
  /** Marks a final or irreversible deliverable */
  readonly finalDeliverable: boolean;
  /** Marks an item that changes the output schema or domain model */
  readonly affectsOntology: boolean;
}

export interface SpecificationMetadata {
  readonly specId: string;
  readonly version: string;
  readonly createdAt: string;
  readonly ambiguityScore: number;
}

export interface Specification {
  readonly goal: string;
  readonly taskType: TaskKind;
  readonly constraints: readonly string[];
  readonly workItems: readonly WorkItemSpec[];
  readonly outputSchema: OutputSchema;
  readonly evaluationPrinciples: readonly EvaluationPrinciple[];
  readonly exitConditions: readonly ExitCondition[];
  readonly metadata: SpecificationMetadata;
}
