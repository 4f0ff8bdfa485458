/**
 * Task profiles: per task kind capability sets and prompt data.
 *
 * Each kind of specification has exactly one profile, looked up by kind.
 */

import { TaskKind } from '../types/specification.js';

export interface TaskPromptInput {
  goal: string;
  itemLabel: string;
  itemText: string;
  /** Rendered context of earlier levels, may be empty */
  contextBlock: string;
  /** Notice about items running alongside this one, may be empty */
  siblingNotice: string;
  /** Feedback from earlier attempts, may be empty */
  feedback: string;
  /** Lateral strategy instructions, may be empty */
  strategy: string;
}

export interface TaskProfile {
  readonly kind: TaskKind;
  readonly label: string;
  readonly capabilities: readonly string[];
  readonly systemPrompt: string;
  buildTaskPrompt(input: TaskPromptInput): string;
}

export const TASK_COMPLETE_MARKER = '[TASK_COMPLETE]';

function composePrompt(input: TaskPromptInput, instructions: string): string {
  const sections = [
    `## Goal\n${input.goal}`,
    `## ${input.itemLabel}\n${input.itemText}`,
  ];
  if (input.contextBlock) {
    sections.push(input.contextBlock);
  }
  if (input.siblingNotice) {
    sections.push(input.siblingNotice);
  }
  if (input.feedback) {
    sections.push(`## Feedback From Previous Attempts\n${input.feedback}`);
  }
  if (input.strategy) {
    sections.push(input.strategy);
  }
  sections.push(`## Instructions\n${instructions}\n\nWhen finished, end your reply with ${TASK_COMPLETE_MARKER}.`);
  return sections.join('\n\n');
}

const codeProfile: TaskProfile = {
  kind: TaskKind.CODE,
  label: 'code',
  capabilities: ['Read', 'Write', 'Edit', 'Bash', 'Glob', 'Grep'],
  systemPrompt:
    'You are implementing one part of a larger software change. Make the smallest complete change that satisfies the task and keep existing behavior intact.',
  buildTaskPrompt: (input) =>
    composePrompt(
      input,
      'Implement the task in the workspace. Run the relevant build or tests when available and summarize the files you changed.'
    ),
};

const researchProfile: TaskProfile = {
  kind: TaskKind.RESEARCH,
  label: 'research',
  capabilities: ['Read', 'Write', 'Glob', 'Grep', 'WebFetch', 'WebSearch'],
  systemPrompt:
    'You are researching one question of a larger investigation. Cite the sources you used and separate findings from speculation.',
  buildTaskPrompt: (input) =>
    composePrompt(
      input,
      'Gather the information the task asks for and write your findings to a markdown file in the workspace. Summarize the key findings in your reply.'
    ),
};

const analysisProfile: TaskProfile = {
  kind: TaskKind.ANALYSIS,
  label: 'analysis',
  capabilities: ['Read', 'Glob', 'Grep', 'Write'],
  systemPrompt:
    'You are analyzing one aspect of a larger problem. Reason from the material in the workspace and state your assumptions.',
  buildTaskPrompt: (input) =>
    composePrompt(
      input,
      'Analyze the material relevant to the task and write a structured report to the workspace. Summarize your conclusions in your reply.'
    ),
};

export const TASK_PROFILES: Readonly<Record<TaskKind, TaskProfile>> = {
  [TaskKind.CODE]: codeProfile,
  [TaskKind.RESEARCH]: researchProfile,
  [TaskKind.ANALYSIS]: analysisProfile,
};

export function getTaskProfile(kind: TaskKind): TaskProfile {
  return TASK_PROFILES[kind];
}
