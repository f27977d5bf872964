import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import { APICallError, generateText, type LanguageModel, type ModelMessage } from "ai";
import { ExternalServiceError, InterruptedError, errorMessage } from "../errors.js";
import type { Provider, RunConfig, WorkStage } from "../state/types.js";
import * as logger from "../ui/logger.js";
import { retry } from "../util/retry.js";
import { withTimeout } from "../util/timeout.js";

export interface GenerationMessage {
  role: "user" | "assistant";
  content: string;
}

export interface GenerationRequest {
  stage: WorkStage;
  system: string;
  messages: GenerationMessage[];
  /** Set for Coder calls, so a scripted generator can answer per task. */
  taskId?: string;
  signal?: AbortSignal;
}

/**
 * The external text-generation service. Implementations throw
 * ExternalServiceError for service failures and nothing else.
 */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

export const DEFAULT_MODELS: Record<Provider, string> = {
  gemini: "gemini-2.5-flash",
  anthropic: "claude-sonnet-4-5",
  openai: "gpt-4o-mini",
};

const API_KEY_VARS: Record<Provider, string> = {
  gemini: "GEMINI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
};

export function resolveLanguageModel(
  provider: Provider,
  modelId: string,
  env: NodeJS.ProcessEnv = process.env
): LanguageModel {
  const variable = API_KEY_VARS[provider];
  const apiKey = env[variable] ?? (provider === "gemini" ? env.GOOGLE_GENERATIVE_AI_API_KEY : undefined);
  if (!apiKey) {
    throw new ExternalServiceError(`${variable} is required for the ${provider} provider.`, false);
  }

  switch (provider) {
    case "gemini":
      return createGoogleGenerativeAI({ apiKey })(modelId);
    case "anthropic":
      return createAnthropic({ apiKey })(modelId);
    case "openai":
      return createOpenAI({ apiKey })(modelId);
  }
}

/** Map anything the SDK throws onto the error taxonomy. */
export function toServiceError(error: unknown, provider: Provider): ExternalServiceError {
  if (error instanceof ExternalServiceError) return error;
  if (APICallError.isInstance(error)) {
    const status = error.statusCode ?? null;
    const retryable = error.isRetryable || status === 429 || (status !== null && status >= 500);
    return new ExternalServiceError(
      `${provider} request failed${status !== null ? ` (${status})` : ""}: ${error.message}`,
      retryable,
      status
    );
  }
  return new ExternalServiceError(`${provider} request failed: ${errorMessage(error)}`, false);
}

export type GenerateTextOptions = Parameters<typeof generateText>[0];
export type GenerateTextFn = (options: GenerateTextOptions) => Promise<{ text: string }>;

export class AiSdkGenerator implements TextGenerator {
  constructor(
    private readonly config: Pick<RunConfig, "provider" | "model" | "stageModels">,
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly generateTextFn: GenerateTextFn = generateText
  ) {}

  async generate(request: GenerationRequest): Promise<string> {
    const { provider } = this.config;
    const modelId = this.config.stageModels[request.stage] ?? this.config.model;
    const model = resolveLanguageModel(provider, modelId, this.env);

    try {
      const result = await this.generateTextFn({
        model,
        system: request.system,
        messages: request.messages.map(toModelMessage),
        maxRetries: 0,
        abortSignal: request.signal,
      });
      return result.text;
    } catch (error) {
      if (request.signal?.aborted) {
        throw new InterruptedError();
      }
      throw toServiceError(error, provider);
    }
  }
}

function toModelMessage(message: GenerationMessage): ModelMessage {
  return message.role === "user"
    ? { role: "user", content: message.content }
    : { role: "assistant", content: message.content };
}

/**
 * Call the generator under `generationTimeoutMs`, retrying recoverable
 * service errors with exponential backoff. Cancellation surfaces as
 * InterruptedError.
 */
export async function generateWithRetry(
  generator: TextGenerator,
  request: Omit<GenerationRequest, "signal">,
  config: Pick<RunConfig, "generationTimeoutMs" | "serviceRetries" | "serviceRetryDelayMs">,
  signal?: AbortSignal
): Promise<string> {
  if (signal?.aborted) {
    throw new InterruptedError();
  }
  const timeoutMs = config.generationTimeoutMs;
  try {
    return await retry(
      () =>
        withTimeout(
          (attemptSignal) => generator.generate({ ...request, signal: attemptSignal }),
          timeoutMs,
          () => new ExternalServiceError(`${request.stage} generation timed out after ${timeoutMs}ms`, true),
          signal
        ),
      {
        maxAttempts: config.serviceRetries,
        baseDelayMs: config.serviceRetryDelayMs,
        shouldAbort: (error) => !(error instanceof ExternalServiceError && error.recoverable),
        onRetry: (error, attempt, delayMs) =>
          logger.debug(
            `${request.stage} generation attempt ${attempt + 1} failed (${errorMessage(error)}); retrying in ${Math.round(delayMs)}ms`
          ),
        signal,
      }
    );
  } catch (error) {
    if (signal?.aborted) {
      throw new InterruptedError();
    }
    throw error;
  }
}
