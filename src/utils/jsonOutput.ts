/**
 * Pull JSON payloads out of noisy tool output
 */
import type { z } from 'zod';

export interface ParseResult<T> {
  data: T | null;
  error?: string;
}

/**
 * Extract the first JSON object in `output` that satisfies `schema`.
 * Lines starting with `marker` are tried first, then any line that is a
 * bare object, then balanced-brace spans anywhere in the text.
 */
export function extractJson<T>(output: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, marker?: string): ParseResult<T> {
  const lines = output.split(/\r?\n/);

  if (marker) {
    for (const line of lines) {
      const trimmed = line.trim();
      if (trimmed.startsWith(marker)) {
        const parsed = tryParse(trimmed.slice(marker.length).trim(), schema);
        if (parsed !== null) return { data: parsed };
      }
    }
  }

  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.startsWith('{') && trimmed.endsWith('}')) {
      const parsed = tryParse(trimmed, schema);
      if (parsed !== null) return { data: parsed };
    }
  }

  let depth = 0;
  let startIdx = -1;
  for (let i = 0; i < output.length; i++) {
    if (output[i] === '{') {
      if (depth === 0) startIdx = i;
      depth++;
    } else if (output[i] === '}' && depth > 0) {
      depth--;
      if (depth === 0 && startIdx !== -1) {
        const parsed = tryParse(output.substring(startIdx, i + 1), schema);
        if (parsed !== null) return { data: parsed };
        startIdx = -1;
      }
    }
  }

  return { data: null, error: 'No valid JSON found in output' };
}

function tryParse<T>(candidate: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  let value: unknown;
  try {
    value = JSON.parse(candidate);
  } catch {
    return null;
  }
  const result = schema.safeParse(value);
  return result.success ? result.data : null;
}
