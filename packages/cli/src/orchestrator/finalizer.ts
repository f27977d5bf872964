/**
 * Stage 6: Finalizing
 *
 * Summarizes what was generated and, when enabled, commits it to a fresh git
 * repository. Git problems are reported but do not fail the run.
 */

import type { SandboxGateway } from "../sandbox/gateway.js";
import type { ProjectMetadata, ProjectState, RunConfig, ToolCall } from "../state/types.js";
import type { Toolbox } from "../tools/toolbox.js";
import * as logger from "../ui/logger.js";

const GITIGNORE = [
  "__pycache__/",
  "*.pyc",
  "*.pyo",
  "*.pyd",
  ".Python",
  "env/",
  "venv/",
  "*.so",
  "*.egg",
  "*.egg-info/",
  "dist/",
  "build/",
  ".env",
  ".venv",
  "node_modules/",
  ".DS_Store",
  "*.log",
];

export interface FinalizeOptions {
  state: ProjectState;
  config: Pick<RunConfig, "enableGit" | "enableDocker">;
  gateway: SandboxGateway;
  toolbox: Toolbox;
  signal?: AbortSignal;
}

export async function runFinalizing(options: FinalizeOptions): Promise<ProjectMetadata> {
  const { state, config, gateway } = options;

  const gitInitialized = config.enableGit ? await initializeRepository(options) : false;

  const filesCreated = await gateway.listDirectory();
  let totalLines = 0;
  for (const file of filesCreated) {
    totalLines += countLines(await gateway.readFile(file));
  }

  const metadata: ProjectMetadata = {
    projectName: state.name,
    createdAt: state.createdAt,
    completedAt: Date.now(),
    filesCreated,
    totalLines,
    packages: state.plan?.requiredPackages ?? [],
    gitInitialized,
    dockerEnabled: config.enableDocker,
    testsGenerated: state.testArtifacts.length > 0,
  };

  logger.info(`${filesCreated.length} files, ${totalLines} lines`);
  return metadata;
}

export function countLines(content: string): number {
  if (content === "") return 0;
  const lines = content.split("\n").length;
  return content.endsWith("\n") ? lines - 1 : lines;
}

async function initializeRepository(options: FinalizeOptions): Promise<boolean> {
  const { state, gateway } = options;
  const steps: ToolCall[] = [
    { action: "git", args: ["init"] },
    { action: "git", args: ["add", "."] },
    { action: "git", args: ["commit", "-m", `Initial commit: ${state.name}`] },
  ];
  if (!(await gateway.exists(".gitignore"))) {
    steps.unshift({ action: "write_file", path: ".gitignore", content: GITIGNORE.join("\n") + "\n" });
  }

  for (const step of steps) {
    const record = await options.toolbox.execute(step, options.signal);
    if (!record.ok) {
      logger.warn(`Git setup failed: ${record.error?.message ?? "unknown error"}`);
      return false;
    }
  }
  logger.success("Initialized git repository");
  return true;
}
