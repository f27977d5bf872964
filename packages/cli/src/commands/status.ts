/**
 * `forgeline status` command: list checkpoints or show one project.
 */

import chalk from "chalk";
import { Command } from "commander";
import { errorMessage } from "../errors.js";
import { CheckpointStore } from "../state/checkpoint.js";
import { loadConfig, resolveRunConfig } from "../state/config.js";
import { restoreProject } from "../state/project.js";
import type { ProjectState } from "../state/types.js";
import * as logger from "../ui/logger.js";
import { displayTaskGraph } from "../ui/plan-display.js";
import { CodingProgress } from "../ui/progress.js";

export function statusCommand(): Command {
  return new Command("status")
    .description("Show project status")
    .argument("[id]", "Project ID (lists all if omitted)")
    .option("--json", "Output as JSON")
    .action(async (id: string | undefined, opts: { json?: boolean }) => {
      try {
        const config = resolveRunConfig(await loadConfig());
        const store = new CheckpointStore(config.checkpointDir);
        if (id) {
          await showProject(store, id, opts.json ?? false);
        } else {
          await listAllProjects(store, opts.json ?? false);
        }
      } catch (error) {
        logger.error(errorMessage(error));
        process.exitCode = 1;
      }
    });
}

async function showProject(store: CheckpointStore, id: string, json: boolean): Promise<void> {
  const checkpoint = await store.load(id);
  if (!checkpoint) {
    logger.error(`Project not found: ${id}`);
    process.exitCode = 1;
    return;
  }

  if (json) {
    console.log(JSON.stringify(checkpoint, null, 2));
    return;
  }

  printProjectSummary(restoreProject(checkpoint, store.pathFor(id)));
}

async function listAllProjects(store: CheckpointStore, json: boolean): Promise<void> {
  const projects = await store.list();

  if (json) {
    console.log(JSON.stringify(projects, null, 2));
    return;
  }

  if (projects.length === 0) {
    logger.info("No projects found.");
    return;
  }

  logger.header("Projects");
  for (const p of projects) {
    const date = new Date(p.timestamp).toLocaleString();
    console.log(`  ${p.projectId}  ${chalk.bold(p.name)}  ${stageLabel(p.lastCompletedStage)}`);
    console.log(chalk.dim(`    Updated: ${date}`));
    console.log();
  }
}

function printProjectSummary(state: ProjectState): void {
  logger.header(`Project: ${state.name}`);
  console.log(`  ID:         ${state.id}`);
  console.log(`  Request:    ${state.prompt}`);
  console.log(`  Directory:  ${state.rootDir}`);
  console.log(`  Completed:  ${stageLabel(state.lastCompletedStage)}`);
  console.log(`  Next:       ${state.stage}`);
  console.log(`  Iterations: ${state.iterationsUsed}`);
  console.log(`  Created:    ${new Date(state.createdAt).toLocaleString()}`);
  console.log(`  Updated:    ${new Date(state.updatedAt).toLocaleString()}`);

  if (state.taskGraph) {
    displayTaskGraph(state.taskGraph);
    new CodingProgress(state.taskGraph.tasks).render(state.tasks).forEach((line) => console.log(line));
  }

  if (state.reviews.length > 0) {
    logger.header("Reviews");
    for (const review of state.reviews) {
      const verdict = review.approved ? chalk.green("approved") : chalk.yellow("changes suggested");
      console.log(`  ${review.filePath}: ${review.score}/100 ${verdict}`);
    }
  }

  if (state.metadata) {
    logger.header("Result");
    console.log(`  Files: ${state.metadata.filesCreated.length}`);
    console.log(`  Lines: ${state.metadata.totalLines}`);
    console.log(`  Git:   ${state.metadata.gitInitialized ? "initialized" : "no"}`);
  }
}

function stageLabel(stage: ProjectState["lastCompletedStage"]): string {
  if (stage === null) return chalk.gray("not started");
  if (stage === "finalizing") return chalk.green("done");
  return chalk.yellow(stage);
}
