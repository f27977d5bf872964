import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { createProject, nextStage, restoreProject, toSnapshot, validateProjectName } from "./project.js";
import type { Checkpoint } from "../validation/schemas.js";
import type { TaskExecution } from "./types.js";

function execution(taskId: string, status: TaskExecution["status"]): TaskExecution {
  return {
    taskId,
    status,
    startedAt: 10,
    completedAt: status === "done" || status === "failed" ? 20 : null,
    iterations: 2,
    summary: status === "done" ? `${taskId} written` : null,
    error: status === "failed" ? { kind: "BudgetExhausted", message: "out of iterations" } : null,
    history: [],
  };
}

describe("createProject", () => {
  it("creates a pending project rooted under the output directory", () => {
    const state = createProject({ prompt: "A calculator", name: "calc", outputDir: "/tmp/out" });

    expect(state.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(state.rootDir).toBe(path.resolve("/tmp/out", "calc"));
    expect(state.stage).toBe("planning");
    expect(state.status).toBe("pending");
    expect(state.lastCompletedStage).toBeNull();
    expect(state.tasks).toEqual({});
    expect(state.iterationsUsed).toBe(0);
  });

  it("generates unique ids", () => {
    const a = createProject({ prompt: "a", name: "a", outputDir: "/tmp" });
    const b = createProject({ prompt: "b", name: "b", outputDir: "/tmp" });
    expect(a.id).not.toBe(b.id);
  });

  it("rejects names that are not a single directory", () => {
    expect(() => createProject({ prompt: "x", name: "../escape", outputDir: "/tmp" })).toThrow(
      "Project name may only contain letters, digits, '.', '_' and '-'"
    );
    expect(validateProjectName("..")).not.toBeNull();
    expect(validateProjectName("todo-api_2.0")).toBeNull();
  });
});

describe("nextStage", () => {
  it("follows the fixed stage order", () => {
    expect(nextStage(null)).toBe("planning");
    expect(nextStage("planning")).toBe("architecting");
    expect(nextStage("coding")).toBe("reviewing");
    expect(nextStage("finalizing")).toBe("done");
  });
});

describe("snapshot and restore", () => {
  it("persists in-progress tasks as pending", () => {
    const state = createProject({ prompt: "p", name: "calc", outputDir: "/tmp" });
    state.tasks = { t1: execution("t1", "done"), t2: execution("t2", "in_progress") };

    const snapshot = toSnapshot(state);

    expect(snapshot.taskStatuses.t1.status).toBe("done");
    expect(snapshot.taskStatuses.t2.status).toBe("pending");
    expect(snapshot.taskStatuses.t2.startedAt).toBeNull();
    expect(state.tasks.t2.status).toBe("in_progress");
  });

  it("restores after the last completed stage and resets unfinished tasks", () => {
    const checkpoint: Checkpoint = {
      version: 1,
      projectId: "p-1",
      lastCompletedStage: "architecting",
      project: { name: "calc", rootDir: "/tmp/calc", prompt: "A calculator", createdAt: 5 },
      plan: null,
      taskGraph: null,
      taskStatuses: {
        t1: execution("t1", "done"),
        t2: execution("t2", "failed"),
        t3: execution("t3", "in_progress"),
      },
      reviews: [],
      testArtifacts: [],
      metadata: null,
      iterationsUsed: 7,
      timestamp: 99,
    };

    const state = restoreProject(checkpoint, "/ckpt/p-1.json");

    expect(state.id).toBe("p-1");
    expect(state.stage).toBe("coding");
    expect(state.status).toBe("pending");
    expect(state.iterationsUsed).toBe(7);
    expect(state.checkpointPath).toBe("/ckpt/p-1.json");
    expect(state.tasks.t1).toEqual(execution("t1", "done"));
    expect(state.tasks.t2.status).toBe("pending");
    expect(state.tasks.t2.error).toBeNull();
    expect(state.tasks.t3.status).toBe("pending");
    expect(state.failure).toBeNull();
  });

  it("restores a finished project as succeeded", () => {
    const checkpoint: Checkpoint = {
      version: 1,
      projectId: "p-2",
      lastCompletedStage: "finalizing",
      project: { name: "calc", rootDir: "/tmp/calc", prompt: "A calculator", createdAt: 5 },
      plan: null,
      taskGraph: null,
      taskStatuses: {},
      reviews: [],
      testArtifacts: [],
      metadata: null,
      iterationsUsed: 2,
      timestamp: 99,
    };

    const state = restoreProject(checkpoint);

    expect(state.stage).toBe("done");
    expect(state.status).toBe("succeeded");
  });
});
