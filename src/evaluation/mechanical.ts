/**
 * Stage 1: Mechanical checks.
 *
 * Runs a configurable list of shell checks (lint, build, tests, static
 * analysis, coverage) in the workspace. No backend calls.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { execa } from 'execa';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { CheckProfileError } from '../types/errors.js';
import { CheckKind, type CheckResult, type MechanicalResult } from '../types/evaluation.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('mechanical');

const MAX_OUTPUT_TAIL_CHARS = 1000;

export interface CheckRunContext {
  cwd: string;
  timeoutMs: number;
  /** Minimum coverage as a fraction in [0, 1] */
  coverageThreshold: number;
  signal?: AbortSignal;
}

/**
 * One named check. Implementations report failures as results and never
 * throw.
 */
export interface MechanicalCheck {
  readonly name: string;
  readonly kind: CheckKind;
  run(context: CheckRunContext): Promise<CheckResult>;
}

export interface ShellCheckDefinition {
  name: string;
  kind: CheckKind;
  command: string;
  timeoutMs?: number;
  expectedExitCode?: number;
}

function tail(text: string, max: number = MAX_OUTPUT_TAIL_CHARS): string {
  const trimmed = text.trim();
  return trimmed.length <= max ? trimmed : `...${trimmed.slice(trimmed.length - max)}`;
}

const TOTAL_LINE_PATTERN = /^TOTAL\b.*?(\d+(?:\.\d+)?)%/m;
const PERCENT_PATTERN = /(\d+(?:\.\d+)?)%/;

/**
 * Coverage as a fraction. A "TOTAL ... NN%" summary line wins, otherwise
 * the first percentage in the output.
 */
export function parseCoverage(output: string): number | null {
  const match = TOTAL_LINE_PATTERN.exec(output) ?? PERCENT_PATTERN.exec(output);
  if (!match?.[1]) {
    return null;
  }
  const percent = Number.parseFloat(match[1]);
  return Number.isFinite(percent) ? percent / 100 : null;
}

function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export class ShellCheck implements MechanicalCheck {
  readonly name: string;
  readonly kind: CheckKind;
  readonly command: string;
  private readonly timeoutMs: number | undefined;
  private readonly expectedExitCode: number;

  constructor(definition: ShellCheckDefinition) {
    this.name = definition.name;
    this.kind = definition.kind;
    this.command = definition.command;
    this.timeoutMs = definition.timeoutMs;
    this.expectedExitCode = definition.expectedExitCode ?? 0;
  }

  async run(context: CheckRunContext): Promise<CheckResult> {
    const startTime = Date.now();
    const timeout = this.timeoutMs ?? context.timeoutMs;

    log.debug({ check: this.name, command: this.command, timeout }, 'Running check');

    const finish = (passed: boolean, message: string): CheckResult => ({
      name: this.name,
      kind: this.kind,
      passed,
      message,
      durationMs: Date.now() - startTime,
    });

    try {
      const result = await execa(this.command, {
        cwd: context.cwd,
        timeout,
        shell: true,
        reject: false,
        all: true,
        ...(context.signal ? { signal: context.signal } : {}),
        env: { CI: 'true' },
      });

      const output = result.all ?? `${result.stdout}\n${result.stderr}`;

      if (result.timedOut) {
        return finish(false, `${this.name} timed out after ${timeout}ms`);
      }
      if (result.isCanceled) {
        return finish(false, `${this.name} was cancelled`);
      }
      if (result.exitCode !== this.expectedExitCode) {
        const detail = tail(output);
        return finish(
          false,
          `${this.name} failed with exit code ${result.exitCode} (expected ${this.expectedExitCode})${detail ? `\n${detail}` : ''}`
        );
      }

      if (this.kind === CheckKind.COVERAGE) {
        const coverage = parseCoverage(output);
        if (coverage === null) {
          return finish(true, `${this.name} passed (no coverage figure found)`);
        }
        if (coverage < context.coverageThreshold) {
          return finish(
            false,
            `Coverage ${formatPercent(coverage)} below threshold ${formatPercent(context.coverageThreshold)}`
          );
        }
        return finish(true, `Coverage ${formatPercent(coverage)} meets threshold ${formatPercent(context.coverageThreshold)}`);
      }

      return finish(true, `${this.name} passed`);
    } catch (error) {
      log.error({ check: this.name, error }, 'Check execution failed');
      return finish(false, `${this.name} could not run: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

export interface MechanicalEvaluatorOptions {
  checks: readonly MechanicalCheck[];
  workspaceDir: string;
  timeoutMs: number;
  coverageThreshold: number;
}

/**
 * Runs every check in order. The stage passes only when all pass; an
 * empty list passes.
 */
export class MechanicalEvaluator {
  private readonly options: MechanicalEvaluatorOptions;

  constructor(options: MechanicalEvaluatorOptions) {
    this.options = options;
  }

  get checkCount(): number {
    return this.options.checks.length;
  }

  async evaluate(signal?: AbortSignal): Promise<MechanicalResult> {
    const context: CheckRunContext = {
      cwd: this.options.workspaceDir,
      timeoutMs: this.options.timeoutMs,
      coverageThreshold: this.options.coverageThreshold,
    };
    if (signal) {
      context.signal = signal;
    }

    const checks: CheckResult[] = [];
    for (const check of this.options.checks) {
      checks.push(await check.run(context));
    }

    const passed = checks.every((c) => c.passed);
    log.info(
      {
        passed,
        passedCount: checks.filter((c) => c.passed).length,
        failedCount: checks.filter((c) => !c.passed).length,
      },
      'Mechanical checks complete'
    );

    return { passed, checks };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Check profiles
// ═══════════════════════════════════════════════════════════════════════════

const checkDefinitionSchema = z.object({
  name: z.string().min(1),
  kind: z.nativeEnum(CheckKind).default(CheckKind.CUSTOM),
  command: z.string().min(1),
  timeout_ms: z.number().int().positive().optional(),
  expected_exit_code: z.number().int().default(0),
});

const checkProfileSchema = z.array(checkDefinitionSchema);

/**
 * Parse a YAML list of shell checks.
 */
export function parseCheckProfile(content: string, source: string | null = null): ShellCheck[] {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new CheckProfileError(
      [`Failed to parse yaml: ${error instanceof Error ? error.message : String(error)}`],
      source
    );
  }

  const result = checkProfileSchema.safeParse(parsed ?? []);
  if (!result.success) {
    throw new CheckProfileError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      source
    );
  }

  return result.data.map((entry) => {
    const definition: ShellCheckDefinition = {
      name: entry.name,
      kind: entry.kind,
      command: entry.command,
      expectedExitCode: entry.expected_exit_code,
    };
    if (entry.timeout_ms !== undefined) {
      definition.timeoutMs = entry.timeout_ms;
    }
    return new ShellCheck(definition);
  });
}

export async function loadCheckProfile(filePath: string): Promise<ShellCheck[]> {
  const absolutePath = path.resolve(filePath);
  const content = await fs.readFile(absolutePath, 'utf-8');
  const checks = parseCheckProfile(content, absolutePath);
  log.info({ path: absolutePath, checkCount: checks.length }, 'Check profile loaded');
  return checks;
}
