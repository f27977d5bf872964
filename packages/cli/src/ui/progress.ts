import chalk from "chalk";
import type { TaskExecution, TaskNode, TaskStatus } from "../state/types.js";

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

/** Live task list for the coding stage. Redraws in place; TTY only. */
export class CodingProgress {
  private frame = 0;
  private lineCount = 0;

  constructor(
    private readonly tasks: TaskNode[],
    private readonly out: NodeJS.WriteStream = process.stdout
  ) {}

  update(executions: Record<string, TaskExecution>): void {
    if (this.lineCount > 0) {
      this.out.write(`\x1b[${this.lineCount}A\x1b[0J`);
    }

    const lines = this.render(executions);
    this.out.write(lines.join("\n") + "\n");
    this.lineCount = lines.length;
    this.frame++;
  }

  finish(): void {
    this.lineCount = 0;
  }

  render(executions: Record<string, TaskExecution>): string[] {
    const lines = this.tasks.map((task) => {
      const status = executions[task.id]?.status ?? "pending";
      const exec = executions[task.id];
      const iterations = exec && exec.iterations > 0 ? chalk.dim(` (${exec.iterations} it)`) : "";
      return `  ${this.symbol(status)} ${colorFor(status)(`${task.id}: ${task.filePath}`)}${iterations}`;
    });
    lines.push("");
    lines.push(summarize(this.tasks, executions));
    return lines;
  }

  private symbol(status: TaskStatus): string {
    switch (status) {
      case "pending":
        return chalk.gray("○");
      case "in_progress":
        return chalk.yellow(SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length]);
      case "done":
        return chalk.green("✓");
      case "failed":
        return chalk.red("✗");
    }
  }
}

function colorFor(status: TaskStatus): (text: string) => string {
  switch (status) {
    case "pending":
      return chalk.gray;
    case "in_progress":
      return chalk.yellow;
    case "done":
      return chalk.green;
    case "failed":
      return chalk.red;
  }
}

export function summarize(tasks: TaskNode[], executions: Record<string, TaskExecution>): string {
  const counts: Record<TaskStatus, number> = { pending: 0, in_progress: 0, done: 0, failed: 0 };
  for (const task of tasks) {
    counts[executions[task.id]?.status ?? "pending"]++;
  }

  const parts: string[] = [];
  if (counts.done > 0) parts.push(chalk.green(`${counts.done} done`));
  if (counts.in_progress > 0) parts.push(chalk.yellow(`${counts.in_progress} running`));
  if (counts.pending > 0) parts.push(chalk.gray(`${counts.pending} pending`));
  if (counts.failed > 0) parts.push(chalk.red(`${counts.failed} failed`));

  return `  ${parts.join(chalk.dim(" | "))}`;
}
