/**
 * Coding stage: walks the task graph and drives each task through the
 * tool-calling loop.
 *
 * Work-stealing over a bounded pool:
 *   while tasks are running or ready:
 *     fail pending tasks whose dependencies failed
 *     ready = pending tasks whose dependencies are all done
 *     start min(ready.count, free slots) tasks
 *     wait for any running task to settle
 *
 * A task only becomes ready once every dependency is done, so a task never
 * runs alongside one of its ancestors or descendants.
 */

import type { TextGenerator } from "../api/generator.js";
import { InterruptedError, StageFailedError, type ErrorKind } from "../errors.js";
import { buildCoderSystemPrompt, buildCoderTaskPrompt } from "../prompts/coder.js";
import type { ProjectState, RunConfig, TaskExecution, TaskGraph, TaskNode } from "../state/types.js";
import type { Toolbox } from "../tools/toolbox.js";
import * as logger from "../ui/logger.js";
import type { IterationBudget } from "./budget.js";
import { blockedTasks, failedDependency, readyTasks } from "./task-graph.js";
import { runToolLoop } from "./tool-loop.js";

export interface CodingOptions {
  /** Mutated in place; `tasks` reflects every status change as it happens. */
  state: ProjectState;
  generator: TextGenerator;
  toolbox: Toolbox;
  budget: IterationBudget;
  config: RunConfig;
  signal?: AbortSignal;
  /** Persist progress. Called after every task that reaches `done`. */
  checkpoint: () => Promise<void>;
  onTaskUpdate?: () => void;
}

export function newTaskExecution(taskId: string): TaskExecution {
  return {
    taskId,
    status: "pending",
    startedAt: null,
    completedAt: null,
    iterations: 0,
    summary: null,
    error: null,
    history: [],
  };
}

/**
 * Run every pending task. Throws InterruptedError on cancellation and
 * StageFailedError naming the first failed task (in execution order) if any
 * task failed.
 */
export async function runCoding(options: CodingOptions): Promise<void> {
  const { state, config, signal } = options;
  const { plan, taskGraph: graph } = state;
  if (!plan || !graph) {
    throw new Error("Coding requires a plan and a task graph");
  }

  for (const task of graph.tasks) {
    state.tasks[task.id] ??= newTaskExecution(task.id);
  }

  const byId = new Map(graph.tasks.map((t) => [t.id, t]));
  const system = buildCoderSystemPrompt({
    git: config.enableGit,
    webLookup: config.enableWebSearch,
    packages: plan.requiredPackages,
  });
  const maxParallel = Math.max(1, config.maxParallel);
  const active = new Map<string, Promise<void>>();
  let checkpointError: unknown = null;

  const runTask = async (task: TaskNode): Promise<void> => {
    const exec = state.tasks[task.id];
    const completedDeps = task.dependsOn.flatMap((depId) => {
      const dep = byId.get(depId);
      const depExec = state.tasks[depId];
      return dep && depExec ? [{ taskId: depId, filePath: dep.filePath, summary: depExec.summary }] : [];
    });

    const result = await runToolLoop({
      task,
      execution: exec,
      system,
      taskPrompt: buildCoderTaskPrompt(task, plan, completedDeps),
      generator: options.generator,
      toolbox: options.toolbox,
      budget: options.budget,
      config,
      signal,
      onRecord: (record) =>
        logger.debug(`${task.id} ${record.call.action}: ${record.ok ? "ok" : record.error?.message}`),
    });
    state.iterationsUsed = options.budget.used;

    switch (result.exit) {
      case "complete":
        exec.status = "done";
        exec.completedAt = Date.now();
        exec.summary = result.summary;
        logger.success(`${task.id} done: ${task.filePath}`);
        try {
          await options.checkpoint();
        } catch (error) {
          checkpointError = error;
        }
        break;
      case "interrupted":
        exec.status = "pending";
        exec.startedAt = null;
        break;
      default:
        exec.status = "failed";
        exec.completedAt = Date.now();
        exec.error = result.error;
        logger.error(`${task.id} failed: ${result.error?.message ?? result.exit}`);
    }
    options.onTaskUpdate?.();
  };

  const start = (task: TaskNode): void => {
    const exec = state.tasks[task.id];
    exec.status = "in_progress";
    exec.startedAt = Date.now();
    exec.completedAt = null;
    exec.error = null;
    exec.iterations = 0;
    exec.history = [];
    logger.info(`Started ${task.id}: ${task.filePath}`);
    options.onTaskUpdate?.();

    const promise = runTask(task).finally(() => active.delete(task.id));
    active.set(task.id, promise);
  };

  for (;;) {
    markBlocked(graph, state.tasks);

    const anyFailed = Object.values(state.tasks).some((t) => t.status === "failed");
    const dispatching =
      !signal?.aborted &&
      checkpointError === null &&
      !(anyFailed && config.taskFailurePolicy === "abort");

    if (dispatching) {
      const slots = maxParallel - active.size;
      for (const task of readyTasks(graph, state.tasks).slice(0, slots)) {
        start(task);
      }
    }

    if (active.size === 0) break;
    await Promise.race(active.values());
  }

  if (checkpointError !== null) throw checkpointError;

  if (signal?.aborted) {
    for (const exec of Object.values(state.tasks)) {
      if (exec.status === "in_progress") exec.status = "pending";
    }
    throw new InterruptedError();
  }

  const firstFailed = graph.order.map((id) => state.tasks[id]).find((t) => t?.status === "failed");
  if (firstFailed) {
    const reason: { kind: ErrorKind; message: string } = firstFailed.error ?? {
      kind: "StageFailed",
      message: `${firstFailed.taskId} failed`,
    };
    throw new StageFailedError("coding", reason, firstFailed.taskId);
  }

  const done = Object.values(state.tasks).filter((t) => t.status === "done").length;
  logger.success(`Completed: ${done}/${graph.tasks.length} tasks`);
}

/** Fail every pending task downstream of a failed one. */
function markBlocked(graph: TaskGraph, executions: Record<string, TaskExecution>): void {
  for (const task of blockedTasks(graph, executions)) {
    const exec = executions[task.id];
    const dep = failedDependency(task, executions);
    exec.status = "failed";
    exec.completedAt = Date.now();
    exec.error = { kind: "StageFailed", message: `dependency ${dep ?? "upstream"} failed` };
    logger.dim(`Skipped ${task.id}: dependency ${dep ?? "upstream"} failed`);
  }
}
