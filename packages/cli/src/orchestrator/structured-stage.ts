/**
 * Shared retry path for stages whose output is a single JSON artifact.
 *
 * Each attempt goes through generateWithRetry (timeout and backoff for the
 * service itself). An attempt whose output does not validate is answered
 * with the validation issues as a correction, up to `maxStageRetries` times.
 */

import { generateWithRetry, type GenerationMessage, type TextGenerator } from "../api/generator.js";
import { StageFailedError, type ValidationError } from "../errors.js";
import { buildCorrectionPrompt } from "../prompts/correction.js";
import type { RunConfig, WorkStage } from "../state/types.js";
import * as logger from "../ui/logger.js";
import type { ValidationResult } from "../validation/structured-output.js";

export interface StageContext {
  generator: TextGenerator;
  config: RunConfig;
  signal?: AbortSignal;
}

export interface StructuredRequest<T> {
  stage: WorkStage;
  system: string;
  prompt: string;
  /** Human-readable name of the artifact, for logs. */
  label: string;
  interpret: (raw: string) => ValidationResult<T>;
}

export async function runStructuredStage<T>(context: StageContext, request: StructuredRequest<T>): Promise<T> {
  const { config } = context;
  const attempts = 1 + config.maxStageRetries;
  const messages: GenerationMessage[] = [{ role: "user", content: request.prompt }];
  let lastError: ValidationError | null = null;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    const raw = await generateWithRetry(
      context.generator,
      { stage: request.stage, system: request.system, messages: [...messages] },
      config,
      context.signal
    );

    const result = request.interpret(raw);
    if (result.ok) return result.value;

    lastError = result.error;
    logger.warn(`${request.label} rejected (attempt ${attempt}/${attempts}): ${result.error.message}`);
    messages.push({ role: "assistant", content: raw });
    messages.push({ role: "user", content: buildCorrectionPrompt(result.error.toFeedback()) });
  }

  throw new StageFailedError(request.stage, {
    kind: "ValidationError",
    message: lastError?.message ?? `${request.label} could not be produced`,
  });
}
