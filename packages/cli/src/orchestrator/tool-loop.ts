/**
 * Bounded reasoning/acting loop for a single task.
 *
 * Every iteration takes one unit from the run-wide budget, asks the
 * generator for exactly one action and executes it. The loop has a closed
 * set of exits; there is no other way out.
 */

import { generateWithRetry, type GenerationMessage, type TextGenerator } from "../api/generator.js";
import { BudgetExhausted, InterruptedError, describeError, type ErrorKind } from "../errors.js";
import { formatToolCall, formatToolResult } from "../prompts/coder.js";
import type { RunConfig, TaskExecution, TaskNode, ToolCallRecord } from "../state/types.js";
import { isFatal, type Toolbox } from "../tools/toolbox.js";
import { CoderActionSchema } from "../validation/schemas.js";
import { validateStructuredOutput } from "../validation/structured-output.js";
import type { IterationBudget } from "./budget.js";

export type ToolLoopExit = "complete" | "budget_exhausted" | "fatal" | "service_error" | "interrupted";

export interface ToolLoopResult {
  exit: ToolLoopExit;
  summary: string | null;
  error: { kind: ErrorKind; message: string } | null;
}

export interface ToolLoopOptions {
  task: TaskNode;
  /** Mutated in place: `iterations` and `history` grow as the loop runs. */
  execution: TaskExecution;
  system: string;
  taskPrompt: string;
  generator: TextGenerator;
  toolbox: Toolbox;
  budget: IterationBudget;
  config: Pick<RunConfig, "generationTimeoutMs" | "serviceRetries" | "serviceRetryDelayMs">;
  signal?: AbortSignal;
  onRecord?: (record: ToolCallRecord) => void;
}

const INTERRUPTED: ToolLoopResult = {
  exit: "interrupted",
  summary: null,
  error: { kind: "Interrupted", message: "Run cancelled" },
};

export async function runToolLoop(options: ToolLoopOptions): Promise<ToolLoopResult> {
  const { task, execution, budget, signal } = options;

  for (;;) {
    if (signal?.aborted) return INTERRUPTED;
    if (!budget.tryConsume()) {
      return {
        exit: "budget_exhausted",
        summary: null,
        error: describeError(
          new BudgetExhausted("iterations", `Iteration budget of ${budget.limit} exhausted while working on ${task.id}`)
        ),
      };
    }
    execution.iterations++;

    let raw: string;
    try {
      raw = await generateWithRetry(
        options.generator,
        {
          stage: "coding",
          system: options.system,
          messages: buildConversation(options.taskPrompt, execution.history),
          taskId: task.id,
        },
        options.config,
        signal
      );
    } catch (error) {
      if (error instanceof InterruptedError) return INTERRUPTED;
      return { exit: "service_error", summary: null, error: describeError(error) };
    }

    const parsed = validateStructuredOutput(raw, CoderActionSchema, "coder action");
    if (!parsed.ok) {
      record(options, {
        call: { action: "invalid", raw },
        ok: false,
        output: null,
        error: { kind: "ValidationError", message: parsed.error.message },
        durationMs: 0,
      });
      continue;
    }

    const action = parsed.value;
    if (action.action === "complete") {
      return { exit: "complete", summary: action.summary || null, error: null };
    }

    const result = await options.toolbox.execute(action, signal);
    record(options, result);
    if (isFatal(result)) {
      return { exit: "fatal", summary: null, error: result.error };
    }
  }
}

/** Task prompt followed by every earlier action and its result. */
export function buildConversation(taskPrompt: string, history: ToolCallRecord[]): GenerationMessage[] {
  const messages: GenerationMessage[] = [{ role: "user", content: taskPrompt }];
  for (const entry of history) {
    messages.push({ role: "assistant", content: formatToolCall(entry) });
    messages.push({ role: "user", content: formatToolResult(entry) });
  }
  return messages;
}

function record(options: ToolLoopOptions, entry: ToolCallRecord): void {
  options.execution.history.push(entry);
  options.onRecord?.(entry);
}
