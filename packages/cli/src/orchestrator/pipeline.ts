/**
 * Pipeline state machine.
 *
 *   planning → architecting → coding → reviewing → testing → finalizing → done
 *
 * `advance` runs exactly one stage. The only side effects are generator
 * calls, tool calls inside the project root, and checkpoint writes. A stage
 * is committed (checkpointed) only once its output is valid; a failure
 * leaves the previous checkpoint untouched so the run can be resumed.
 */

import type { TextGenerator } from "../api/generator.js";
import { InterruptedError, StageFailedError, describeError } from "../errors.js";
import { SandboxGateway } from "../sandbox/gateway.js";
import type { CheckpointStore } from "../state/checkpoint.js";
import { createProject, nextStage, restoreProject, toSnapshot } from "../state/project.js";
import { STAGE_ORDER, type Plan, type ProjectState, type RunConfig, type Stage, type WorkStage } from "../state/types.js";
import { Toolbox, type GitRunner } from "../tools/toolbox.js";
import * as logger from "../ui/logger.js";
import { runArchitecting } from "./architect.js";
import { IterationBudget } from "./budget.js";
import { newTaskExecution, runCoding } from "./executor.js";
import { runFinalizing } from "./finalizer.js";
import { runPlanning } from "./planner.js";
import { runReviewing } from "./reviewer.js";
import type { StageContext } from "./structured-stage.js";
import { runTesting } from "./tester.js";

export { nextStage } from "../state/project.js";

export interface PipelineHooks {
  onStageCommitted?: (stage: WorkStage, state: ProjectState) => void;
  onTaskUpdate?: (state: ProjectState) => void;
}

export interface PipelineOptions {
  generator: TextGenerator;
  checkpoints: CheckpointStore;
  config: RunConfig;
  signal?: AbortSignal;
  hooks?: PipelineHooks;
  /** Tool backends; default to the real git binary and global fetch. */
  git?: GitRunner;
  fetch?: typeof fetch;
}

const STAGE_LABELS: Record<WorkStage, string> = {
  planning: "Planning project",
  architecting: "Designing task graph",
  coding: "Writing code",
  reviewing: "Reviewing code",
  testing: "Generating tests",
  finalizing: "Finalizing project",
};

export class Pipeline {
  constructor(private readonly options: PipelineOptions) {}

  /** Create a project and write its initial checkpoint. */
  async start(params: { prompt: string; name: string }): Promise<ProjectState> {
    const state = createProject({ ...params, outputDir: this.options.config.outputDir });
    await this.gateway(state);
    await this.checkpoint(state, null);
    logger.info(`Project ${state.name} (${state.id}) at ${state.rootDir}`);
    return state;
  }

  /** Restore a project from its checkpoint; the next `advance` continues after the last committed stage. */
  async resume(projectId: string): Promise<ProjectState> {
    const { checkpoints } = this.options;
    const checkpoint = await checkpoints.load(projectId);
    if (!checkpoint) {
      throw new Error(`No checkpoint found for project ${projectId}`);
    }
    const state = restoreProject(checkpoint, checkpoints.pathFor(projectId));
    logger.info(`Resuming ${state.name} at stage ${state.stage}`);
    return state;
  }

  /** Run stages until the project is done or failed. */
  async run(state: ProjectState): Promise<ProjectState> {
    while (state.stage !== "done" && state.stage !== "failed") {
      await this.advance(state);
    }
    return state;
  }

  async advance(state: ProjectState): Promise<Stage> {
    const stage = state.stage;
    if (stage === "done" || stage === "failed") return stage;

    state.status = "running";
    logger.step(STAGE_ORDER.indexOf(stage) + 1, STAGE_ORDER.length, STAGE_LABELS[stage]);

    try {
      if (this.options.signal?.aborted) throw new InterruptedError();
      await this.runStage(stage, state);
      await this.checkpoint(state, stage);
    } catch (error) {
      if (error instanceof InterruptedError || this.options.signal?.aborted) {
        await this.interrupt(state, stage);
      } else {
        this.fail(state, stage, error);
      }
      return state.stage;
    }

    state.lastCompletedStage = stage;
    this.options.hooks?.onStageCommitted?.(stage, state);
    state.stage = nextStage(stage);
    if (state.stage === "done") {
      state.status = "succeeded";
      logger.success(`Project ${state.name} complete`);
    }
    return state.stage;
  }

  private async runStage(stage: WorkStage, state: ProjectState): Promise<void> {
    const { config } = this.options;
    const context: StageContext = {
      generator: this.options.generator,
      config,
      signal: this.options.signal,
    };

    switch (stage) {
      case "planning":
        state.plan = await runPlanning(context, state);
        return;

      case "architecting": {
        const graph = await runArchitecting(context, requirePlan(state));
        state.taskGraph = graph;
        state.tasks = Object.fromEntries(graph.tasks.map((task) => [task.id, newTaskExecution(task.id)]));
        return;
      }

      case "coding": {
        const { toolbox } = await this.workspace(state);
        await runCoding({
          state,
          generator: this.options.generator,
          toolbox,
          budget: new IterationBudget(config.iterationBudget, state.iterationsUsed),
          config,
          signal: this.options.signal,
          checkpoint: () => this.checkpoint(state, state.lastCompletedStage),
          onTaskUpdate: () => this.options.hooks?.onTaskUpdate?.(state),
        });
        return;
      }

      case "reviewing": {
        if (!config.enableReview) {
          logger.dim("Review disabled; skipping");
          return;
        }
        const { gateway } = await this.workspace(state);
        state.reviews = await runReviewing(context, requirePlan(state), gateway);
        return;
      }

      case "testing": {
        if (!config.enableTesting) {
          logger.dim("Test generation disabled; skipping");
          return;
        }
        const { gateway, toolbox } = await this.workspace(state);
        state.testArtifacts = await runTesting(context, requirePlan(state), gateway, toolbox);
        return;
      }

      case "finalizing": {
        const { gateway, toolbox } = await this.workspace(state);
        state.metadata = await runFinalizing({ state, config, gateway, toolbox, signal: this.options.signal });
        return;
      }
    }
  }

  private fail(state: ProjectState, stage: WorkStage, error: unknown): void {
    const { kind, message } = describeError(error);
    state.failure = {
      stage,
      kind,
      message,
      taskId: error instanceof StageFailedError ? error.taskId : null,
    };
    state.stage = "failed";
    state.status = "failed";
    logger.error(`Stage ${stage} failed: ${message}`);
  }

  /** Record the cancellation and flush progress under the last committed stage. */
  private async interrupt(state: ProjectState, stage: WorkStage): Promise<void> {
    for (const exec of Object.values(state.tasks)) {
      if (exec.status === "in_progress") {
        exec.status = "pending";
        exec.startedAt = null;
      }
    }
    state.failure = { stage, kind: "Interrupted", message: "Run cancelled", taskId: null };
    state.stage = "failed";
    state.status = "interrupted";
    await this.checkpoint(state, state.lastCompletedStage);
    logger.warn(`Run cancelled during ${stage}; resume with: forgeline generate --resume ${state.id}`);
  }

  private async checkpoint(state: ProjectState, stage: WorkStage | null): Promise<void> {
    state.updatedAt = Date.now();
    state.checkpointPath = await this.options.checkpoints.save(state.id, stage, toSnapshot(state));
  }

  private gateway(state: ProjectState): Promise<SandboxGateway> {
    return SandboxGateway.create(state.rootDir, { maxFileBytes: this.options.config.maxFileBytes });
  }

  private async workspace(state: ProjectState): Promise<{ gateway: SandboxGateway; toolbox: Toolbox }> {
    const gateway = await this.gateway(state);
    const toolbox = new Toolbox({
      gateway,
      plan: state.plan,
      config: this.options.config,
      git: this.options.git,
      fetch: this.options.fetch,
    });
    return { gateway, toolbox };
  }
}

function requirePlan(state: ProjectState): Plan {
  if (!state.plan) {
    throw new Error(`Project ${state.id} has no plan`);
  }
  return state.plan;
}
