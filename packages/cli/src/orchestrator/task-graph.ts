import * as path from "node:path";
import type { Plan, TaskExecution, TaskGraph, TaskNode } from "../state/types.js";
import type { ArchitectOutput } from "../validation/schemas.js";
import { ValidationError } from "../errors.js";
import type { ValidationResult } from "../validation/structured-output.js";

/**
 * Build the task graph from Architect output.
 *
 * Tasks are mapped 1:1 in listing order and given ids t1, t2, ...
 * Each `dependsOn` entry is a file path: it must name a file in the plan and
 * resolves to every other task that targets that file.
 */
export function buildTaskGraph(plan: Plan, output: ArchitectOutput): ValidationResult<TaskGraph> {
  const errors: string[] = [];
  const planPaths = new Set(plan.files.map((f) => normalizeFilePath(f.path)));

  const ids = output.tasks.map((_, i) => `t${i + 1}`);
  const producers = new Map<string, string[]>();
  output.tasks.forEach((task, i) => {
    const key = normalizeFilePath(task.filePath);
    producers.set(key, [...(producers.get(key) ?? []), ids[i]]);
  });

  const tasks: TaskNode[] = output.tasks.map((task, i) => {
    const id = ids[i];
    const ownPath = normalizeFilePath(task.filePath);
    const dependsOn: string[] = [];

    for (const dep of task.dependsOn) {
      const depPath = normalizeFilePath(dep);
      if (!planPaths.has(depPath)) {
        errors.push(`tasks.${i}.dependsOn: "${dep}" is not a file in the plan`);
        continue;
      }
      const others = (producers.get(depPath) ?? []).filter((other) => other !== id);
      if (others.length === 0) {
        errors.push(
          depPath === ownPath
            ? `tasks.${i}.dependsOn: task ${id} depends on its own file "${dep}"`
            : `tasks.${i}.dependsOn: "${dep}" is in the plan but no task produces it`
        );
        continue;
      }
      for (const other of others) {
        if (!dependsOn.includes(other)) dependsOn.push(other);
      }
    }

    return {
      id,
      filePath: task.filePath,
      instruction: task.instruction,
      dependsOn,
      priority: task.priority,
      complexity: task.complexity,
    };
  });

  errors.push(...validateDag(tasks).errors);
  if (errors.length > 0) {
    return { ok: false, error: new ValidationError(errors, "task graph") };
  }

  return { ok: true, value: { tasks, order: executionOrder(tasks) } };
}

/**
 * Validate a DAG of tasks for structural correctness.
 */
export function validateDag(tasks: TaskNode[]): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const ids = new Set(tasks.map((t) => t.id));

  const seen = new Set<string>();
  for (const task of tasks) {
    if (seen.has(task.id)) {
      errors.push(`Duplicate task ID: "${task.id}"`);
    }
    seen.add(task.id);
  }

  for (const task of tasks) {
    for (const dep of task.dependsOn) {
      if (!ids.has(dep)) {
        errors.push(`Task "${task.id}" depends on unknown task "${dep}"`);
      }
    }
  }

  const cycleNodes = detectCycles(tasks);
  if (cycleNodes.length > 0) {
    errors.push(`Cycle detected involving tasks: ${cycleNodes.join(", ")}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Group tasks into waves by dependency depth.
 * Wave 0 = tasks with no dependencies.
 * Wave N = tasks whose deepest dependency is in wave N-1.
 * Within a wave, tasks are ordered by ascending priority, then listing order.
 */
export function computeWaves(tasks: TaskNode[]): TaskNode[][] {
  const depths = computeDepths(tasks);
  const waves: TaskNode[][] = [];

  tasks.forEach((task) => {
    const depth = depths.get(task.id) ?? 0;
    while (waves.length <= depth) waves.push([]);
    waves[depth].push(task);
  });

  const position = new Map(tasks.map((t, i) => [t.id, i]));
  for (const wave of waves) {
    wave.sort(
      (a, b) => a.priority - b.priority || (position.get(a.id) ?? 0) - (position.get(b.id) ?? 0)
    );
  }
  return waves;
}

/**
 * Deterministic execution order: waves in order, each sorted by priority then
 * listing position. Every task comes after all of its dependencies.
 */
export function executionOrder(tasks: TaskNode[]): string[] {
  return computeWaves(tasks).flatMap((wave) => wave.map((t) => t.id));
}

/**
 * Pending tasks, in execution order, whose dependencies are all done.
 */
export function readyTasks(graph: TaskGraph, executions: Record<string, TaskExecution>): TaskNode[] {
  const byId = new Map(graph.tasks.map((t) => [t.id, t]));
  const ready: TaskNode[] = [];
  for (const id of graph.order) {
    const task = byId.get(id);
    if (!task || executions[id]?.status !== "pending") continue;
    if (task.dependsOn.every((dep) => executions[dep]?.status === "done")) {
      ready.push(task);
    }
  }
  return ready;
}

/**
 * Pending tasks, in execution order, with a failed dependency anywhere
 * upstream. Relies on `order` placing every task after its dependencies.
 */
export function blockedTasks(graph: TaskGraph, executions: Record<string, TaskExecution>): TaskNode[] {
  const byId = new Map(graph.tasks.map((t) => [t.id, t]));
  const poisoned = new Set<string>();
  const blocked: TaskNode[] = [];
  for (const id of graph.order) {
    const task = byId.get(id);
    if (!task) continue;
    const status = executions[id]?.status;
    const upstreamFailed = task.dependsOn.some((dep) => poisoned.has(dep));
    if (status === "failed") {
      poisoned.add(id);
    } else if (upstreamFailed && status === "pending") {
      poisoned.add(id);
      blocked.push(task);
    }
  }
  return blocked;
}

/** First dependency of `task` that has failed, if any. */
export function failedDependency(
  task: TaskNode,
  executions: Record<string, TaskExecution>
): string | null {
  return task.dependsOn.find((dep) => executions[dep]?.status === "failed") ?? null;
}

export function normalizeFilePath(filePath: string): string {
  const normalized = path.posix.normalize(filePath.trim().replace(/\\/g, "/"));
  return normalized.replace(/^\.\//, "");
}

function computeDepths(tasks: TaskNode[]): Map<string, number> {
  const byId = new Map(tasks.map((t) => [t.id, t]));
  const depths = new Map<string, number>();
  const trail = new Set<string>();

  function visit(id: string): number {
    const cached = depths.get(id);
    if (cached !== undefined) return cached;
    const task = byId.get(id);
    if (!task) return -1;
    if (trail.has(id)) {
      throw new Error(`Cannot order tasks: cycle through "${id}"`);
    }

    trail.add(id);
    let depth = 0;
    for (const dep of task.dependsOn) {
      depth = Math.max(depth, visit(dep) + 1);
    }
    trail.delete(id);

    depths.set(id, depth);
    return depth;
  }

  for (const task of tasks) {
    visit(task.id);
  }
  return depths;
}

/**
 * Detect cycles using Tarjan's strongly connected components algorithm.
 * Returns IDs of tasks involved in cycles (empty if acyclic).
 */
function detectCycles(tasks: TaskNode[]): string[] {
  const adj = new Map<string, string[]>();
  for (const task of tasks) {
    adj.set(task.id, task.dependsOn);
  }

  let index = 0;
  const indices = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const cycleNodes: string[] = [];

  function strongConnect(id: string): number {
    const ownIndex = index++;
    let lowlink = ownIndex;
    indices.set(id, ownIndex);
    stack.push(id);
    onStack.add(id);

    for (const dep of adj.get(id) ?? []) {
      const depIndex = indices.get(dep);
      if (depIndex === undefined) {
        lowlink = Math.min(lowlink, strongConnect(dep));
      } else if (onStack.has(dep)) {
        lowlink = Math.min(lowlink, depIndex);
      }
    }

    if (lowlink === ownIndex) {
      const component: string[] = [];
      let w: string | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack.delete(w);
        component.push(w);
      } while (w !== id);

      // A component of one node is a cycle only if it depends on itself
      if (component.length > 1 || (adj.get(id) ?? []).includes(id)) {
        cycleNodes.push(...component);
      }
    }

    return lowlink;
  }

  for (const task of tasks) {
    if (!indices.has(task.id)) {
      strongConnect(task.id);
    }
  }

  return cycleNodes;
}
