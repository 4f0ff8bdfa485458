/**
 * Evaluation context rendering shared by the semantic and consensus stages.
 */

import type { ExecutionTrace, Specification, WorkItemNode } from '../types/index.js';
import { writtenPaths } from '../types/trace.js';
import { truncate } from '../utils/json.js';

const MAX_ARTIFACT_CHARS = 8000;

/**
 * What a stage sees of one attempt.
 */
export interface EvaluationRequest {
  item: WorkItemNode;
  trace: ExecutionTrace;
  attempt: number;
  maxAttempts: number;
  /** Reasons from every earlier attempt, oldest first */
  history: readonly string[];
  lateralStrategyAdopted: boolean;
  signal?: AbortSignal;
}

function bulletList(values: readonly string[], empty: string): string {
  return values.length > 0 ? values.map((v) => `- ${v}`).join('\n') : empty;
}

export function renderArtifact(trace: ExecutionTrace): string {
  const files = writtenPaths(trace);
  const output = truncate(trace.output.trim(), MAX_ARTIFACT_CHARS) || '(no output)';
  return `### Files Written
${bulletList(files, 'None')}

### Agent Output
\`\`\`
${output}
\`\`\``;
}

export function renderEvaluationContext(specification: Specification, request: EvaluationRequest): string {
  const schemaFields = specification.outputSchema.fields
    .map((f) => `- ${f.name} (${f.type}${f.required ? '' : ', optional'})${f.description ? `: ${f.description}` : ''}`)
    .join('\n');
  const principles = specification.evaluationPrinciples.map(
    (p) => `${p.name} (weight ${p.weight})${p.description ? `: ${p.description}` : ''}`
  );
  const exitConditions = specification.exitConditions.map(
    (c) => `${c.name}${c.description ? `: ${c.description}` : ''}${c.criteria ? ` [criteria: ${c.criteria}]` : ''}`
  );

  return `## Work Item (#${request.item.index + 1})
${request.item.text}

## Original Goal
${specification.goal}

## Constraints
${bulletList(specification.constraints, 'None specified')}

## Output Schema: ${specification.outputSchema.name}
${schemaFields || 'No fields declared'}

## Evaluation Principles
${bulletList(principles, 'None specified')}

## Exit Conditions
${bulletList(exitConditions, 'None specified')}

## Previous Attempts
${bulletList(request.history, 'This is the first attempt.')}

## Artifact (attempt ${request.attempt} of ${request.maxAttempts})
${renderArtifact(request.trace)}`;
}
