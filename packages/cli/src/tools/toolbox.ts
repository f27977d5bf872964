/**
 * Tool surface available to the Coder and the later stages.
 *
 * `execute` turns every tool-level failure into a ToolCallRecord; only a
 * caller bug (not a tool failure) escapes as an exception.
 */

import { simpleGit } from "simple-git";
import { z } from "zod";
import { PipelineError, ToolExecutionError, errorMessage } from "../errors.js";
import type { SandboxGateway } from "../sandbox/gateway.js";
import type { Plan, RunConfig, ToolCall, ToolCallRecord } from "../state/types.js";
import { RateLimiter } from "../util/rate-limit.js";
import { withTimeout } from "../util/timeout.js";
import {
  addPackageJsonDependency,
  addRequirement,
  manifestKind,
  manifestPath,
  packageBaseName,
} from "./manifest.js";

const ALLOWED_GIT_SUBCOMMANDS = new Set(["init", "add", "commit", "status", "log", "diff", "rev-parse"]);

const DENIED_GIT_OPTIONS = ["-C", "--git-dir", "--work-tree", "--exec-path", "--output"];

const WEB_LOOKUP_ENDPOINT = "https://api.duckduckgo.com/";
const WEB_LOOKUP_MAX_CHARS = 4000;
const WEB_LOOKUP_INTERVAL_MS = 1000;

export interface GitRunner {
  run(args: string[], signal: AbortSignal): Promise<string>;
}

export interface ToolboxOptions {
  gateway: SandboxGateway;
  plan: Plan | null;
  config: Pick<RunConfig, "enableGit" | "enableWebSearch" | "toolTimeoutMs">;
  git?: GitRunner;
  fetch?: typeof fetch;
}

export class Toolbox {
  private readonly git: GitRunner;
  private readonly fetchImpl: typeof fetch;
  private readonly lookups = new RateLimiter(WEB_LOOKUP_INTERVAL_MS);

  constructor(private readonly options: ToolboxOptions) {
    this.git = options.git ?? simpleGitRunner(options.gateway.root, options.config.toolTimeoutMs);
    this.fetchImpl = options.fetch ?? fetch;
  }

  async execute(call: ToolCall, signal?: AbortSignal): Promise<ToolCallRecord> {
    const started = Date.now();
    const { toolTimeoutMs } = this.options.config;
    try {
      const output = await withTimeout(
        (callSignal) => this.dispatch(call, callSignal),
        toolTimeoutMs,
        () => new ToolExecutionError(`${call.action} timed out after ${toolTimeoutMs}ms`, call.action, "timeout"),
        signal
      );
      return { call, ok: true, output, error: null, durationMs: Date.now() - started };
    } catch (error) {
      const described =
        error instanceof PipelineError
          ? { kind: error.kind, message: error.message }
          : { kind: "ToolExecutionError" as const, message: `${call.action} failed: ${errorMessage(error)}` };
      return { call, ok: false, output: null, error: described, durationMs: Date.now() - started };
    }
  }

  private async dispatch(call: ToolCall, signal: AbortSignal): Promise<string> {
    const { gateway } = this.options;
    switch (call.action) {
      case "write_file": {
        const bytes = await gateway.writeFile(call.path, call.content);
        return `Wrote ${bytes} bytes to ${call.path}`;
      }
      case "read_file":
        return gateway.readFile(call.path);
      case "list_directory": {
        const files = await gateway.listDirectory(call.path);
        return files.length > 0 ? files.join("\n") : "(empty)";
      }
      case "get_current_directory":
        return gateway.currentDirectory();
      case "git":
        return this.runGit(call.args, signal);
      case "install_dependency":
        return this.installDependency(call.name);
      case "web_lookup":
        return this.webLookup(call.query, signal);
    }
  }

  private async runGit(args: string[], signal: AbortSignal): Promise<string> {
    if (!this.options.config.enableGit) {
      throw new ToolExecutionError("Tool git is disabled for this run", "git", "disabled");
    }
    const [subcommand] = args;
    if (!ALLOWED_GIT_SUBCOMMANDS.has(subcommand)) {
      throw new ToolExecutionError(
        `git ${subcommand} is not allowed; use one of: ${[...ALLOWED_GIT_SUBCOMMANDS].join(", ")}`,
        "git",
        "rejected"
      );
    }
    const denied = args.find((arg) =>
      DENIED_GIT_OPTIONS.some((option) => arg === option || arg.startsWith(`${option}=`))
    );
    if (denied !== undefined) {
      throw new ToolExecutionError(`git option ${denied} is not allowed`, "git", "rejected");
    }
    // Path arguments must stay inside the project as well.
    for (const arg of args.slice(1)) {
      if (!arg.startsWith("-")) await this.options.gateway.resolve(arg);
    }

    const output = await this.git.run(args, signal);
    return output.trim() || "(no output)";
  }

  private async installDependency(spec: string): Promise<string> {
    const { plan, gateway } = this.options;
    const name = packageBaseName(spec);
    const declared = plan?.requiredPackages.find((p) => packageBaseName(p) === name);
    if (!plan || declared === undefined) {
      throw new ToolExecutionError(
        `Package ${name} is not in the plan's required packages`,
        "install_dependency",
        "rejected"
      );
    }

    const kind = manifestKind(plan);
    if (kind === null) {
      throw new ToolExecutionError(
        `No dependency manifest is known for stack: ${plan.techStack.join(", ") || "(none)"}`,
        "install_dependency",
        "rejected"
      );
    }

    const file = manifestPath(kind);
    const existing = (await gateway.exists(file)) ? await gateway.readFile(file) : null;
    const result =
      kind === "requirements"
        ? addRequirement(existing ?? "", declared)
        : addPackageJsonDependency(existing, declared, plan.name);
    if (!result.added) {
      return `${name} is already listed in ${file}`;
    }
    await gateway.writeFile(file, result.content);
    return `Added ${declared} to ${file}`;
  }

  private async webLookup(query: string, signal: AbortSignal): Promise<string> {
    if (!this.options.config.enableWebSearch) {
      throw new ToolExecutionError("Tool web_lookup is disabled for this run", "web_lookup", "disabled");
    }
    await this.lookups.acquire(signal);

    const url = new URL(WEB_LOOKUP_ENDPOINT);
    url.searchParams.set("q", query);
    url.searchParams.set("format", "json");
    url.searchParams.set("no_html", "1");
    url.searchParams.set("skip_disambig", "1");

    const res = await this.fetchImpl(url, { signal });
    if (!res.ok) {
      throw new ToolExecutionError(`Web lookup failed: HTTP ${res.status}`, "web_lookup");
    }
    const body = InstantAnswerSchema.safeParse(await res.json());
    if (!body.success) {
      throw new ToolExecutionError("Web lookup returned an unexpected response", "web_lookup");
    }
    return truncate(formatInstantAnswer(body.data), WEB_LOOKUP_MAX_CHARS);
  }
}

function simpleGitRunner(root: string, timeoutMs: number): GitRunner {
  const git = simpleGit({
    baseDir: root,
    timeout: { block: timeoutMs },
    config: ["user.name=Forgeline", "user.email=forgeline@localhost"],
  });
  return {
    async run(args) {
      const output: string = await git.raw(args);
      return output;
    },
  };
}

const TopicSchema = z.object({
  Text: z.string().optional(),
  FirstURL: z.string().optional(),
});

const InstantAnswerSchema = z.object({
  Heading: z.string().default(""),
  AbstractText: z.string().default(""),
  AbstractURL: z.string().default(""),
  RelatedTopics: z.array(z.unknown()).default([]),
});

type InstantAnswer = z.infer<typeof InstantAnswerSchema>;

export function formatInstantAnswer(answer: InstantAnswer): string {
  const sections: string[] = [];
  if (answer.AbstractText) {
    const heading = answer.Heading ? `${answer.Heading}: ` : "";
    sections.push(`${heading}${answer.AbstractText}`);
    if (answer.AbstractURL) sections.push(`URL: ${answer.AbstractURL}`);
  }

  const topics = answer.RelatedTopics.flatMap((raw) => {
    const topic = TopicSchema.safeParse(raw);
    return topic.success && topic.data.Text ? [topic.data] : [];
  }).slice(0, 3);
  topics.forEach((topic, i) => {
    sections.push(`${i + 1}. ${topic.Text ?? ""}${topic.FirstURL ? `\n   URL: ${topic.FirstURL}` : ""}`);
  });

  return sections.length > 0 ? sections.join("\n") : "No results found";
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max)}\n[truncated]`;
}

/** A record whose failure must end the task rather than be fed back to the model. */
export function isFatal(record: ToolCallRecord): boolean {
  return record.error?.kind === "PathViolation";
}
