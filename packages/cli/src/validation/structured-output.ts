/**
 * Structured Output Validator.
 *
 * Turns a stage's raw output into a typed artifact, or a ValidationError
 * listing every violated field. Shape only: whether the artifact is any good
 * is the Reviewer's concern.
 */

import type { z } from "zod";
import { ValidationError } from "../errors.js";
import { extractJson } from "../util/json-extractor.js";

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: ValidationError };

/**
 * Validate raw stage output against `schema`. Strings are first reduced to
 * JSON (code fences, inline objects); any other value is validated as-is.
 */
export function validateStructuredOutput<T>(
  raw: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label = "output"
): ValidationResult<T> {
  let candidate = raw;
  if (typeof raw === "string") {
    const extracted = extractJson(raw);
    if (!extracted.ok) {
      return { ok: false, error: new ValidationError([`(root): ${extracted.reason}`], label) };
    }
    candidate = extracted.value;
  }

  const parsed = schema.safeParse(candidate);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }

  return { ok: false, error: new ValidationError(formatIssues(parsed.error), label) };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}
