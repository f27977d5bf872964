import { describe, it, expect } from "vitest";
import {
  blockedTasks,
  buildTaskGraph,
  computeWaves,
  executionOrder,
  failedDependency,
  readyTasks,
  validateDag,
} from "./task-graph.js";
import type { Plan, TaskExecution, TaskNode } from "../state/types.js";
import type { ArchitectTask } from "../validation/schemas.js";

function task(id: string, dependsOn: string[] = [], overrides: Partial<TaskNode> = {}): TaskNode {
  return {
    id,
    filePath: `src/${id}.py`,
    instruction: `Implement ${id}`,
    dependsOn,
    priority: 0,
    complexity: "medium",
    ...overrides,
  };
}

function plan(...paths: string[]): Plan {
  return {
    name: "demo",
    description: "",
    techStack: ["python"],
    features: [],
    files: paths.map((p) => ({ path: p, purpose: `module ${p}` })),
    requiredPackages: [],
  };
}

function archTask(filePath: string, dependsOn: string[] = [], priority = 0): ArchitectTask {
  return { filePath, instruction: `Write ${filePath}`, dependsOn, priority, complexity: "medium" };
}

function execution(taskId: string, status: TaskExecution["status"]): TaskExecution {
  return {
    taskId,
    status,
    startedAt: null,
    completedAt: null,
    iterations: 0,
    summary: null,
    error: null,
    history: [],
  };
}

describe("validateDag", () => {
  it("accepts a valid DAG with no dependencies", () => {
    const result = validateDag([task("t1"), task("t2"), task("t3")]);
    expect(result).toEqual({ valid: true, errors: [] });
  });

  it("accepts a diamond DAG", () => {
    const tasks = [task("t1"), task("t2", ["t1"]), task("t3", ["t1"]), task("t4", ["t2", "t3"])];
    expect(validateDag(tasks).valid).toBe(true);
  });

  it("detects duplicate task IDs", () => {
    const result = validateDag([task("t1"), task("t1")]);
    expect(result.errors).toContain('Duplicate task ID: "t1"');
  });

  it("detects missing dependency references", () => {
    const result = validateDag([task("t1", ["t99"])]);
    expect(result.errors).toEqual(['Task "t1" depends on unknown task "t99"']);
  });

  it("detects a two-node cycle", () => {
    const result = validateDag([task("t1", ["t2"]), task("t2", ["t1"])]);
    expect(result.valid).toBe(false);
    expect(result.errors).toContainEqual(expect.stringContaining("Cycle detected"));
  });

  it("detects a self-dependency", () => {
    const result = validateDag([task("t1", ["t1"])]);
    expect(result.errors).toEqual(["Cycle detected involving tasks: t1"]);
  });

  it("accepts an empty task list", () => {
    expect(validateDag([])).toEqual({ valid: true, errors: [] });
  });
});

describe("buildTaskGraph", () => {
  it("maps one Architect task to one graph task with no dependencies", () => {
    const result = buildTaskGraph(plan("calculator.py"), { tasks: [archTask("calculator.py")] });
    expect(result).toEqual({
      ok: true,
      value: {
        tasks: [
          {
            id: "t1",
            filePath: "calculator.py",
            instruction: "Write calculator.py",
            dependsOn: [],
            priority: 0,
            complexity: "medium",
          },
        ],
        order: ["t1"],
      },
    });
  });

  it("resolves file-path dependencies to task ids", () => {
    const result = buildTaskGraph(plan("utils.py", "main.py"), {
      tasks: [archTask("main.py", ["./utils.py"]), archTask("utils.py")],
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.tasks[0].dependsOn).toEqual(["t2"]);
    expect(result.value.order).toEqual(["t2", "t1"]);
  });

  it("rejects a dependency on a file that is not in the plan", () => {
    const result = buildTaskGraph(plan("main.py"), {
      tasks: [archTask("main.py", ["helpers.py"])],
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toEqual(['tasks.0.dependsOn: "helpers.py" is not a file in the plan']);
  });

  it("rejects a dependency on a plan file that no task produces", () => {
    const result = buildTaskGraph(plan("main.py", "utils.py"), {
      tasks: [archTask("main.py", ["utils.py"])],
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toEqual([
      'tasks.0.dependsOn: "utils.py" is in the plan but no task produces it',
    ]);
  });

  it("rejects a task depending on its own file", () => {
    const result = buildTaskGraph(plan("main.py"), { tasks: [archTask("main.py", ["main.py"])] });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toEqual([
      'tasks.0.dependsOn: task t1 depends on its own file "main.py"',
    ]);
  });

  it("rejects cyclic file dependencies", () => {
    const result = buildTaskGraph(plan("a.py", "b.py"), {
      tasks: [archTask("a.py", ["b.py"]), archTask("b.py", ["a.py"])],
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toEqual(["Cycle detected involving tasks: t2, t1"]);
  });

  it("produces an order in which every task follows its dependencies", () => {
    const result = buildTaskGraph(plan("a.py", "b.py", "c.py", "d.py"), {
      tasks: [
        archTask("d.py", ["b.py", "c.py"]),
        archTask("c.py", ["a.py"], 2),
        archTask("b.py", ["a.py"], 1),
        archTask("a.py"),
      ],
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { tasks, order } = result.value;
    for (const t of tasks) {
      for (const dep of t.dependsOn) {
        expect(order.indexOf(dep)).toBeLessThan(order.indexOf(t.id));
      }
    }
    expect(order).toEqual(["t4", "t3", "t2", "t1"]);
  });
});

describe("executionOrder", () => {
  it("breaks ties by ascending priority, then listing order", () => {
    const tasks = [
      task("t1", [], { priority: 2 }),
      task("t2", [], { priority: 1 }),
      task("t3", [], { priority: 1 }),
    ];
    expect(executionOrder(tasks)).toEqual(["t2", "t3", "t1"]);
  });

  it("never places a low-priority dependency after its dependent", () => {
    const tasks = [task("t1", [], { priority: 9 }), task("t2", ["t1"], { priority: 0 })];
    expect(executionOrder(tasks)).toEqual(["t1", "t2"]);
  });

  it("is deterministic", () => {
    const tasks = [task("t1"), task("t2", ["t1"]), task("t3"), task("t4", ["t3", "t2"])];
    expect(executionOrder(tasks)).toEqual(executionOrder(tasks));
    expect(executionOrder(tasks)).toEqual(["t1", "t3", "t2", "t4"]);
  });
});

describe("computeWaves", () => {
  it("computes a diamond DAG as 3 waves", () => {
    const tasks = [task("t1"), task("t2", ["t1"]), task("t3", ["t1"]), task("t4", ["t2", "t3"])];
    const waves = computeWaves(tasks).map((w) => w.map((t) => t.id));
    expect(waves).toEqual([["t1"], ["t2", "t3"], ["t4"]]);
  });

  it("places a task in the wave after its deepest dependency", () => {
    const tasks = [task("t1"), task("t2", ["t1"]), task("t3", ["t1", "t2"]), task("t5")];
    const waves = computeWaves(tasks).map((w) => w.map((t) => t.id));
    expect(waves).toEqual([["t1", "t5"], ["t2"], ["t3"]]);
  });

  it("returns empty array for no tasks", () => {
    expect(computeWaves([])).toEqual([]);
  });
});

describe("readyTasks", () => {
  it("returns pending tasks whose dependencies are done", () => {
    const tasks = [task("t1"), task("t2", ["t1"]), task("t3")];
    const graph = { tasks, order: executionOrder(tasks) };
    const executions = {
      t1: execution("t1", "done"),
      t2: execution("t2", "pending"),
      t3: execution("t3", "in_progress"),
    };
    expect(readyTasks(graph, executions).map((t) => t.id)).toEqual(["t2"]);
  });

  it("holds back tasks whose dependencies are not done", () => {
    const tasks = [task("t1"), task("t2", ["t1"])];
    const graph = { tasks, order: executionOrder(tasks) };
    const executions = { t1: execution("t1", "in_progress"), t2: execution("t2", "pending") };
    expect(readyTasks(graph, executions)).toEqual([]);
  });
});

describe("failedDependency", () => {
  it("names the first failed dependency", () => {
    const executions = { t1: execution("t1", "done"), t2: execution("t2", "failed") };
    expect(failedDependency(task("t3", ["t1", "t2"]), executions)).toBe("t2");
    expect(failedDependency(task("t4", ["t1"]), executions)).toBeNull();
  });
});

describe("blockedTasks", () => {
  it("finds pending tasks downstream of a failure, directly or transitively", () => {
    const tasks = [task("t1"), task("t2", ["t1"]), task("t3", ["t2"]), task("t4")];
    const graph = { tasks, order: executionOrder(tasks) };
    const executions = {
      t1: execution("t1", "failed"),
      t2: execution("t2", "pending"),
      t3: execution("t3", "pending"),
      t4: execution("t4", "pending"),
    };
    expect(blockedTasks(graph, executions).map((t) => t.id)).toEqual(["t2", "t3"]);
  });
});
