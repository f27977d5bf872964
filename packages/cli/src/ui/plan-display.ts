import chalk from "chalk";
import type { Plan, TaskGraph } from "../state/types.js";
import { computeWaves } from "../orchestrator/task-graph.js";
import * as logger from "./logger.js";

/**
 * Render the plan's files and, once it exists, the task graph with its
 * execution waves.
 */
export function displayPlan(plan: Plan, graph: TaskGraph | null = null): void {
  logger.header(`Plan: ${plan.name}`);
  if (plan.description) console.log(plan.description);
  if (plan.techStack.length > 0) console.log(chalk.dim(`Stack: ${plan.techStack.join(", ")}`));
  console.log();

  for (const file of plan.files) {
    console.log(`  ${padRight(file.path, 32)}${chalk.dim(file.purpose)}`);
  }
  if (plan.requiredPackages.length > 0) {
    console.log();
    console.log(chalk.dim(`Packages: ${plan.requiredPackages.join(", ")}`));
  }

  if (graph) displayTaskGraph(graph);
}

export function displayTaskGraph(graph: TaskGraph): void {
  logger.header("Task Graph");
  console.log(chalk.bold(padRight("#", 6) + padRight("Deps", 12) + padRight("File", 36) + padRight("Prio", 6) + "Size"));
  console.log(chalk.dim("─".repeat(66)));

  for (const task of graph.tasks) {
    const deps = task.dependsOn.length > 0 ? task.dependsOn.join(", ") : "—";
    const sizeColor =
      task.complexity === "high" ? chalk.red : task.complexity === "medium" ? chalk.yellow : chalk.green;

    console.log(
      padRight(task.id, 6) +
        padRight(deps, 12) +
        padRight(task.filePath, 36) +
        padRight(String(task.priority), 6) +
        sizeColor(task.complexity)
    );
  }

  const waves = computeWaves(graph.tasks);
  console.log();
  for (let i = 0; i < waves.length; i++) {
    const wave = waves[i];
    console.log(`  ${chalk.cyan(`Wave ${i + 1}`)}  ${wave.map((t) => t.id).join(", ")}`);
  }

  console.log();
  logger.info(`${graph.tasks.length} tasks across ${waves.length} waves`);
}

function padRight(str: string, width: number): string {
  if (str.length >= width) return str.slice(0, width - 1) + " ";
  return str + " ".repeat(width - str.length);
}
