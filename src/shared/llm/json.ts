/**
 * JSON decoding for model output
 *
 * Models wrap JSON in Markdown fences, add prose around it, or leave
 * trailing commas. Decoding tries, in order: the fenced or trimmed text,
 * the outermost {...} span, then jsonrepair on that span.
 */

import { jsonrepair } from 'jsonrepair';

export type JsonDecodeResult =
  | { ok: true; value: unknown }
  | { ok: false; reason: string };

const FENCE_PATTERN = /```(?:json|JSON)?\s*([\s\S]*?)```/;

export function stripMarkdownFences(text: string): string {
  const match = FENCE_PATTERN.exec(text);
  return (match ? match[1] : text).trim();
}

export function outermostObject(text: string): string | undefined {
  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  return first !== -1 && last > first ? text.substring(first, last + 1) : undefined;
}

function tryParse(text: string): JsonDecodeResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Decode a model answer into a JSON value without throwing
 */
export function decodeJson(text: string): JsonDecodeResult {
  const cleaned = stripMarkdownFences(text);
  if (cleaned.length === 0) {
    return { ok: false, reason: 'response was empty' };
  }

  const direct = tryParse(cleaned);
  if (direct.ok) {
    return direct;
  }

  const candidate = outermostObject(cleaned);
  if (candidate !== undefined) {
    const spanned = tryParse(candidate);
    if (spanned.ok) {
      return spanned;
    }
  }

  try {
    return tryParse(jsonrepair(candidate ?? cleaned));
  } catch (error) {
    const preview = text.substring(0, 200);
    return {
      ok: false,
      reason: `response is not valid JSON (${error instanceof Error ? error.message : String(error)}); preview: ${preview}`
    };
  }
}
