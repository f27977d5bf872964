import * as path from "node:path";
import * as crypto from "node:crypto";
import type { Checkpoint } from "../validation/schemas.js";
import type { CheckpointSnapshot } from "./checkpoint.js";
import type { ProjectState, TaskExecution } from "./types.js";
import { STAGE_ORDER } from "./types.js";

const PROJECT_NAME = /^[A-Za-z0-9._-]+$/;

/** Project names become directory names under the output directory. */
export function validateProjectName(name: string): string | null {
  if (!PROJECT_NAME.test(name) || name === "." || name === "..") {
    return "Project name may only contain letters, digits, '.', '_' and '-'";
  }
  return null;
}

export function createProject(params: { prompt: string; name: string; outputDir: string }): ProjectState {
  const problem = validateProjectName(params.name);
  if (problem) throw new Error(problem);

  const now = Date.now();
  return {
    id: crypto.randomUUID(),
    name: params.name,
    rootDir: path.resolve(params.outputDir, params.name),
    prompt: params.prompt,
    createdAt: now,
    updatedAt: now,
    stage: "planning",
    status: "pending",
    lastCompletedStage: null,
    plan: null,
    taskGraph: null,
    tasks: {},
    reviews: [],
    testArtifacts: [],
    metadata: null,
    iterationsUsed: 0,
    failure: null,
    checkpointPath: null,
  };
}

export function toSnapshot(state: ProjectState): CheckpointSnapshot {
  return {
    project: {
      name: state.name,
      rootDir: state.rootDir,
      prompt: state.prompt,
      createdAt: state.createdAt,
    },
    plan: state.plan,
    taskGraph: state.taskGraph,
    taskStatuses: Object.fromEntries(Object.entries(state.tasks).map(([id, exec]) => [id, settled(exec)])),
    reviews: state.reviews,
    testArtifacts: state.testArtifacts,
    metadata: state.metadata,
    iterationsUsed: state.iterationsUsed,
  };
}

/**
 * Rebuild a project from its checkpoint. Tasks that were running or failed
 * go back to pending; the run continues after the last completed stage.
 * A project whose last stage completed comes back as succeeded.
 */
export function restoreProject(checkpoint: Checkpoint, checkpointPath: string | null = null): ProjectState {
  const tasks: Record<string, TaskExecution> = {};
  for (const [id, exec] of Object.entries(checkpoint.taskStatuses)) {
    tasks[id] = exec.status === "done" ? exec : { ...settled(exec), status: "pending", error: null };
  }

  const stage = nextStage(checkpoint.lastCompletedStage);
  return {
    id: checkpoint.projectId,
    name: checkpoint.project.name,
    rootDir: checkpoint.project.rootDir,
    prompt: checkpoint.project.prompt,
    createdAt: checkpoint.project.createdAt,
    updatedAt: checkpoint.timestamp,
    stage,
    status: stage === "done" ? "succeeded" : "pending",
    lastCompletedStage: checkpoint.lastCompletedStage,
    plan: checkpoint.plan,
    taskGraph: checkpoint.taskGraph,
    tasks,
    reviews: checkpoint.reviews,
    testArtifacts: checkpoint.testArtifacts,
    metadata: checkpoint.metadata,
    iterationsUsed: checkpoint.iterationsUsed,
    failure: null,
    checkpointPath,
  };
}

/** The stage after `lastCompleted` in the fixed order, or `done` after the last one. */
export function nextStage(lastCompleted: ProjectState["lastCompletedStage"]): ProjectState["stage"] {
  if (lastCompleted === null) return STAGE_ORDER[0];
  const index = STAGE_ORDER.indexOf(lastCompleted);
  return STAGE_ORDER[index + 1] ?? "done";
}

/** A task caught mid-flight is persisted as pending. */
function settled(exec: TaskExecution): TaskExecution {
  if (exec.status !== "in_progress") return exec;
  return { ...exec, status: "pending", startedAt: null };
}
