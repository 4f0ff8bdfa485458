/**
 * Trace Collector
 *
 * Folds the message stream of an agent session into an AgentTrace.
 * Messages are validated with zod rather than trusted, since the SDK
 * leaves content blocks loosely typed.
 */

import { z } from 'zod';
import type { AgentTrace, ToolInvocation } from '../types/index.js';

const toolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: z.record(z.unknown()).catch({}),
});

const toolResultBlockSchema = z.object({
  type: z.literal('tool_result'),
  tool_use_id: z.string(),
  is_error: z.boolean().optional(),
});

const textBlockSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

const contentMessageSchema = z.object({
  type: z.enum(['assistant', 'user']),
  message: z.object({
    content: z.union([z.string(), z.array(z.unknown())]),
  }),
});

const systemInitSchema = z.object({
  type: z.literal('system'),
  subtype: z.literal('init'),
  session_id: z.string(),
});

const resultMessageSchema = z.object({
  type: z.literal('result'),
  subtype: z.string(),
  session_id: z.string().optional(),
  result: z.string().optional(),
  num_turns: z.number().optional(),
  total_cost_usd: z.number().optional(),
  errors: z.array(z.string()).optional(),
});

type ResultMessage = z.infer<typeof resultMessageSchema>;

const PATH_KEYS = ['file_path', 'notebook_path', 'path'] as const;

/**
 * Pick the resource path out of a tool input, if it names one.
 */
export function extractResourcePath(input: Readonly<Record<string, unknown>>): string | null {
  for (const key of PATH_KEYS) {
    const value = input[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return null;
}

interface PendingInvocation {
  toolName: string;
  input: Record<string, unknown>;
  success: boolean | null;
}

export class TraceCollector {
  private sessionId: string | null = null;
  private readonly invocations = new Map<string, PendingInvocation>();
  private lastAssistantText = '';
  private result: ResultMessage | null = null;

  /**
   * Process one message from the stream. Unknown shapes are ignored.
   */
  process(message: unknown): void {
    const init = systemInitSchema.safeParse(message);
    if (init.success) {
      this.sessionId = init.data.session_id;
      return;
    }

    const result = resultMessageSchema.safeParse(message);
    if (result.success) {
      this.result = result.data;
      if (!this.sessionId && result.data.session_id) {
        this.sessionId = result.data.session_id;
      }
      return;
    }

    const content = contentMessageSchema.safeParse(message);
    if (!content.success || typeof content.data.message.content === 'string') {
      return;
    }

    const texts: string[] = [];
    for (const block of content.data.message.content) {
      const toolUse = toolUseBlockSchema.safeParse(block);
      if (toolUse.success) {
        this.invocations.set(toolUse.data.id, {
          toolName: toolUse.data.name,
          input: toolUse.data.input,
          success: null,
        });
        continue;
      }

      const toolResult = toolResultBlockSchema.safeParse(block);
      if (toolResult.success) {
        const pending = this.invocations.get(toolResult.data.tool_use_id);
        if (pending) {
          pending.success = toolResult.data.is_error !== true;
        }
        continue;
      }

      const text = textBlockSchema.safeParse(block);
      if (text.success && content.data.type === 'assistant') {
        texts.push(text.data.text);
      }
    }

    if (texts.length > 0) {
      this.lastAssistantText = texts.join('\n');
    }
  }

  /**
   * Error text when the session ended unsuccessfully, null otherwise.
   */
  getError(): { subtype: string; message: string } | null {
    if (!this.result) {
      return { subtype: 'missing_result', message: 'No result message received' };
    }
    if (this.result.subtype === 'success') {
      return null;
    }
    const details = this.result.errors?.join('; ') ?? '';
    return {
      subtype: this.result.subtype,
      message: details ? `${this.result.subtype}: ${details}` : this.result.subtype,
    };
  }

  toTrace(durationMs: number): AgentTrace {
    const invocations: ToolInvocation[] = [];
    for (const pending of this.invocations.values()) {
      invocations.push({
        toolName: pending.toolName,
        input: pending.input,
        // A tool use without a result never completed
        success: pending.success ?? false,
        resourcePath: extractResourcePath(pending.input),
      });
    }

    return {
      invocations,
      output: this.result?.result ?? this.lastAssistantText,
      sessionId: this.sessionId,
      durationMs,
    };
  }
}
