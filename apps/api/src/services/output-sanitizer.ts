/**
 * Output Sanitizer
 *
 * Extracts a JSON object from classifier text that may be wrapped in a code
 * fence or surrounded by prose.
 */

import { isPlainObject } from '../../../../packages/shared-types/src';
import { MalformedOutputError } from '../errors';

export type SanitizeResult =
  | { ok: true; value: Record<string, unknown>; json: string }
  | { ok: false; error: MalformedOutputError; raw: string };

const FENCE_OPEN = /^```[\w-]*[ \t]*\r?\n?/;
const FENCE_CLOSE = /\r?\n?```$/;

/**
 * Remove a leading/trailing code fence and its optional language tag
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  return trimmed.replace(FENCE_OPEN, '').replace(FENCE_CLOSE, '').trim();
}

/**
 * Find the first balanced {...} substring, ignoring braces inside strings.
 * Returns null when no opening brace is ever closed.
 */
export function extractFirstObject(text: string): string | null {
  let start = text.indexOf('{');

  while (start !== -1) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];

      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === '\\') {
          escaped = true;
        } else if (ch === '"') {
          inString = false;
        }
        continue;
      }

      if (ch === '"') {
        inString = true;
      } else if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        depth--;
        if (depth === 0) {
          return text.slice(start, i + 1);
        }
      }
    }

    // Unbalanced from this brace; try the next one
    start = text.indexOf('{', start + 1);
  }

  return null;
}

function tryParseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Sanitize raw classifier output. Never throws.
 *
 * Only the first balanced object is tried; a later valid object after an
 * unparseable one (`Use {x} style: {"intent":"TASK"}`) is not searched for.
 */
export function sanitizeOutput(raw: string): SanitizeResult {
  const unfenced = stripCodeFence(raw);

  const direct = tryParseObject(unfenced);
  if (direct) {
    return { ok: true, value: direct, json: unfenced };
  }

  const candidate = extractFirstObject(unfenced);
  if (candidate) {
    const extracted = tryParseObject(candidate);
    if (extracted) {
      return { ok: true, value: extracted, json: candidate };
    }
  }

  return {
    ok: false,
    error: new MalformedOutputError('Classifier output contained no JSON object'),
    raw,
  };
}
