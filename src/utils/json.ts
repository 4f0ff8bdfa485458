/**
 * JSON extraction for model responses.
 *
 * Backends answer in prose, fenced blocks or bare JSON. These helpers pull
 * the first structured value out of the text so callers can validate it.
 */

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Remove a surrounding markdown code fence, if any.
 */
export function stripCodeFence(text: string): string {
  const match = FENCE_PATTERN.exec(text);
  if (match?.[1] !== undefined) {
    return match[1].trim();
  }
  return text.trim();
}

function sliceBetween(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  if (start === -1 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1);
}

function tryParse(candidate: string | null): unknown {
  if (candidate === null) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(candidate);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Extract a JSON object (between the first '{' and the last '}').
 * Returns undefined when nothing parseable is found.
 */
export function extractJsonObject(text: string): unknown {
  const body = stripCodeFence(text);
  return tryParse(sliceBetween(body, '{', '}'));
}

/**
 * Extract a JSON array (between the first '[' and the last ']').
 */
export function extractJsonArray(text: string): unknown {
  const body = stripCodeFence(text);
  return tryParse(sliceBetween(body, '[', ']'));
}

/**
 * Extract whichever JSON value appears first in the text.
 */
export function extractJson(text: string): unknown {
  const body = stripCodeFence(text);
  const objectStart = body.indexOf('{');
  const arrayStart = body.indexOf('[');
  if (arrayStart !== -1 && (objectStart === -1 || arrayStart < objectStart)) {
    return extractJsonArray(body);
  }
  return extractJsonObject(body);
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}
