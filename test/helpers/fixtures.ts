/**
 * Shared test data.
 */

import { createSpecification } from '../../src/specification/loader.js';
import type { EvaluationRequest } from '../../src/evaluation/context.js';
import type { Specification, SpecificationInput, WorkItemNode } from '../../src/types/index.js';
import { itemTrace, write } from './scripted-invoker.js';

export function testSpecification(overrides: Partial<SpecificationInput> = {}): Specification {
  return createSpecification({
    goal: 'Build a user service',
    constraints: ['Keep the public API stable'],
    workItems: ['Create the user model', 'Add the user repository'],
    outputSchema: {
      name: 'UserService',
      fields: [{ name: 'users', type: 'table', description: 'Stored users' }],
    },
    evaluationPrinciples: [{ name: 'correctness', weight: 0.7, description: 'Does what it says' }],
    exitConditions: [{ name: 'tests pass', criteria: 'npm test exits 0' }],
    metadata: { specId: 'spec-test', ambiguityScore: 0.1 },
    ...overrides,
  });
}

export function testNode(index: number, overrides: Partial<WorkItemNode> = {}): WorkItemNode {
  return {
    index,
    text: `work item ${index}`,
    dependsOn: [],
    finalDeliverable: false,
    affectsOntology: false,
    ...overrides,
  };
}

export function evaluationRequest(overrides: Partial<EvaluationRequest> = {}): EvaluationRequest {
  return {
    item: testNode(0, { text: 'Create the user model' }),
    trace: itemTrace(0, [write('src/user.ts')], 'Created the model [TASK_COMPLETE]'),
    attempt: 1,
    maxAttempts: 3,
    history: [],
    lateralStrategyAdopted: false,
    ...overrides,
  };
}
