/**
 * Extract JSON from model text output.
 *
 * Models return JSON wrapped in markdown code fences, inline with
 * surrounding prose, or as raw JSON.
 */

export type ExtractResult = { ok: true; value: unknown } | { ok: false; reason: string };

const FENCE_PATTERN = /```(?:json|JSON)?[ \t]*\n?([\s\S]*?)```/g;
const MAX_RAW_CANDIDATES = 8;

/**
 * Extract the first valid JSON object or array from text.
 *
 * Tries in order:
 * 1. Each ```json ... ``` or bare ``` ... ``` fence
 * 2. Balanced `{ ... }` spans, left to right
 * 3. Balanced `[ ... ]` spans, left to right
 */
export function extractJson(text: string): ExtractResult {
  if (text.trim().length === 0) {
    return { ok: false, reason: "output is empty" };
  }

  for (const match of text.matchAll(FENCE_PATTERN)) {
    const parsed = tryParse(match[1].trim());
    if (parsed.ok) return parsed;
  }

  for (const [open, close] of [
    ["{", "}"],
    ["[", "]"],
  ] as const) {
    let from = text.indexOf(open);
    let tried = 0;
    while (from !== -1 && tried < MAX_RAW_CANDIDATES) {
      const span = extractBalanced(text, from, open, close);
      if (span) {
        const parsed = tryParse(span);
        if (parsed.ok) return parsed;
      }
      tried++;
      from = text.indexOf(open, from + 1);
    }
  }

  return { ok: false, reason: "no JSON object or array found in output" };
}

function tryParse(candidate: string): ExtractResult {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Extract a balanced substring between open/close delimiters,
 * accounting for nesting and string literals.
 */
function extractBalanced(text: string, start: number, open: string, close: string): string | null {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (ch === "\\") {
      escape = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (ch === open) depth++;
    else if (ch === close) {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
}
