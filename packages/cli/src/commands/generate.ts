/**
 * `forgeline generate` command: the main generation flow.
 *
 * Runs plan → architect → code → review → test → finalize, checkpointing
 * after every stage. Ctrl+C cancels gracefully; a second Ctrl+C exits.
 */

import { createInterface } from "node:readline";
import { Command, InvalidArgumentError } from "commander";
import { AiSdkGenerator, resolveLanguageModel } from "../api/generator.js";
import { errorMessage } from "../errors.js";
import { Pipeline } from "../orchestrator/pipeline.js";
import { CheckpointStore } from "../state/checkpoint.js";
import { ProviderSchema, loadConfig, resolveRunConfig } from "../state/config.js";
import { validateProjectName } from "../state/project.js";
import type { ProjectState, Provider } from "../state/types.js";
import * as logger from "../ui/logger.js";
import { displayPlan, displayTaskGraph } from "../ui/plan-display.js";
import { CodingProgress } from "../ui/progress.js";

interface GenerateOptions {
  name?: string;
  iterations?: number;
  review: boolean;
  test: boolean;
  git?: boolean;
  docker?: boolean;
  webSearch?: boolean;
  provider?: Provider;
  model?: string;
  maxParallel?: number;
  outputDir?: string;
  resume?: string;
  json?: boolean;
}

export function generateCommand(): Command {
  return new Command("generate")
    .description("Generate a project from a description")
    .argument("[prompt]", "What to build")
    .option("--name <name>", "Project name (directory under the output directory)")
    .option("--iterations <n>", "Iteration budget shared by all coding tasks", parsePositiveInt)
    .option("--no-review", "Skip the review stage")
    .option("--no-test", "Skip test generation")
    .option("--git", "Commit the result to a new git repository")
    .option("--docker", "Mark the project as Docker-enabled")
    .option("--web-search", "Let the coder look things up on the web")
    .option("--provider <provider>", "gemini, anthropic or openai", parseProvider)
    .option("--model <model>", "Model id for every stage")
    .option("--max-parallel <n>", "Coding tasks to run at once", parsePositiveInt)
    .option("--output-dir <dir>", "Directory that receives generated projects")
    .option("--resume <id>", "Resume a previous run from its checkpoint")
    .option("--json", "Output structured JSON")
    .action(async (prompt: string | undefined, opts: GenerateOptions) => {
      try {
        process.exitCode = await run(prompt, opts);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exitCode = 1;
      }
    });
}

async function run(promptArg: string | undefined, opts: GenerateOptions): Promise<number> {
  const config = resolveRunConfig(await loadConfig(), {
    iterationBudget: opts.iterations,
    enableReview: opts.review ? undefined : false,
    enableTesting: opts.test ? undefined : false,
    enableGit: opts.git,
    enableDocker: opts.docker,
    enableWebSearch: opts.webSearch,
    provider: opts.provider,
    model: opts.model,
    maxParallel: opts.maxParallel,
    outputDir: opts.outputDir,
  });
  logger.setLogLevel(opts.json ? "silent" : config.logLevel);

  // Fail before any work if the provider key is missing.
  resolveLanguageModel(config.provider, config.model);

  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warn("Cancelling after the current step... (Ctrl+C again to exit now)");
    controller.abort();
  };
  process.on("SIGINT", onSigint);

  const progress: { view: CodingProgress | null } = { view: null };
  const interactive = !opts.json && process.stdout.isTTY === true;

  const pipeline = new Pipeline({
    generator: new AiSdkGenerator(config),
    checkpoints: new CheckpointStore(config.checkpointDir),
    config,
    signal: controller.signal,
    hooks: {
      onStageCommitted: (stage, state) => {
        if (opts.json) return;
        if (stage === "planning" && state.plan) displayPlan(state.plan);
        if (stage === "architecting" && state.taskGraph) displayTaskGraph(state.taskGraph);
        if (stage === "coding") progress.view?.finish();
      },
      onTaskUpdate: (state) => {
        if (!interactive || !state.taskGraph) return;
        progress.view ??= new CodingProgress(state.taskGraph.tasks);
        progress.view.update(state.tasks);
      },
    },
  });

  try {
    let state: ProjectState;
    if (opts.resume) {
      state = await pipeline.resume(opts.resume);
    } else {
      const prompt = promptArg ?? (await ask("What should I build? "));
      const name = opts.name ?? (await ask("Project name: "));
      const problem = validateProjectName(name);
      if (!prompt.trim()) throw new Error("A project description is required");
      if (problem) throw new Error(problem);
      if (!opts.json) logger.header("Forgeline");
      state = await pipeline.start({ prompt: prompt.trim(), name });
    }

    await pipeline.run(state);
    progress.view?.finish();
    report(state, opts.json ?? false);
    return exitCode(state);
  } finally {
    process.off("SIGINT", onSigint);
  }
}

function report(state: ProjectState, json: boolean): void {
  if (json) {
    console.log(
      JSON.stringify(
        {
          projectId: state.id,
          name: state.name,
          stage: state.stage,
          status: state.status,
          rootDir: state.rootDir,
          checkpoint: state.checkpointPath,
          failure: state.failure,
          metadata: state.metadata,
          iterationsUsed: state.iterationsUsed,
        },
        null,
        2
      )
    );
    return;
  }

  console.log();
  if (state.status === "succeeded") {
    logger.success(`Project ready at ${state.rootDir}`);
    if (state.metadata) {
      logger.info(`${state.metadata.filesCreated.length} files, ${state.metadata.totalLines} lines`);
    }
  } else if (state.status === "interrupted") {
    logger.warn(`Run interrupted during ${state.failure?.stage ?? "an unknown stage"}`);
  } else if (state.failure) {
    logger.error(`Failed at ${state.failure.stage}: [${state.failure.kind}] ${state.failure.message}`);
  }
  logger.dim(`Iterations used: ${state.iterationsUsed}`);
  if (state.checkpointPath) logger.dim(`Checkpoint: ${state.checkpointPath}`);
  if (state.status !== "succeeded") {
    logger.info(`Resume with: forgeline generate --resume ${state.id}`);
  }
}

function exitCode(state: ProjectState): number {
  switch (state.status) {
    case "succeeded":
      return 0;
    case "interrupted":
      return 130;
    default:
      return 1;
  }
}

function ask(question: string): Promise<string> {
  if (!process.stdin.isTTY) {
    return Promise.reject(new Error(`Missing input for "${question.trim()}" and stdin is not interactive`));
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function parseProvider(value: string): Provider {
  const parsed = ProviderSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${ProviderSchema.options.join(", ")}.`);
  }
  return parsed.data;
}
