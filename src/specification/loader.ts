/**
 * Specification Loader
 *
 * Builds immutable Specification values from plain objects and from
 * YAML or JSON documents written with snake_case keys.
 *
 * @module specification/loader
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { nanoid } from 'nanoid';
import yaml from 'yaml';
import { SpecificationError } from '../types/errors.js';
import {
  specificationSchema,
  type Specification,
} from '../types/specification.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('specification-loader');

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function toCamelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

/**
 * Recursively rename snake_case object keys to camelCase.
 */
export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(camelizeKeys);
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[toCamelCase(key)] = camelizeKeys(entry);
    }
    return result;
  }
  return value;
}

/**
 * Freeze a value and everything reachable from it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
    Object.freeze(value);
  }
  return value;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Validate a camelCase input object (shaped like SpecificationInput) and
 * return a frozen Specification.
 *
 * @throws SpecificationError listing every missing or invalid field
 */
export function createSpecification(input: unknown, source: string | null = null): Specification {
  const result = specificationSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.errors.map((err) => {
      const fieldPath = err.path.join('.');
      return fieldPath ? `${fieldPath}: ${err.message}` : err.message;
    });
    log.warn({ source, issues }, 'Rejected specification');
    throw new SpecificationError(issues, source);
  }

  const data = result.data;
  const specification: Specification = {
    goal: data.goal,
    taskType: data.taskType,
    constraints: data.constraints,
    workItems: data.workItems,
    outputSchema: data.outputSchema,
    evaluationPrinciples: data.evaluationPrinciples,
    exitConditions: data.exitConditions,
    metadata: {
      specId: data.metadata.specId ?? `spec_${nanoid(12)}`,
      version: data.metadata.version,
      createdAt: data.metadata.createdAt ?? new Date().toISOString(),
      ambiguityScore: data.metadata.ambiguityScore,
    },
  };

  return deepFreeze(specification);
}

/**
 * Parse a specification document (YAML or JSON text, snake_case keys).
 */
export function parseSpecification(content: string, format: 'yaml' | 'json', source: string | null = null): Specification {
  let parsed: unknown;
  try {
    parsed = format === 'json' ? JSON.parse(content) : yaml.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SpecificationError([`Failed to parse ${format}: ${message}`], source);
  }
  return createSpecification(camelizeKeys(parsed), source);
}

/**
 * Load a specification from a .yaml, .yml or .json file.
 */
export async function loadSpecification(filePath: string): Promise<Specification> {
  const absolutePath = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
  const content = await fs.readFile(absolutePath, 'utf-8');
  const ext = path.extname(absolutePath).toLowerCase();
  const format = ext === '.json' ? 'json' : 'yaml';

  const specification = parseSpecification(content, format, absolutePath);
  log.info(
    {
      path: absolutePath,
      specId: specification.metadata.specId,
      workItems: specification.workItems.length,
    },
    'Specification loaded'
  );
  return specification;
}
