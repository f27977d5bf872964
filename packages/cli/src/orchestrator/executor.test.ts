import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { runCoding, type CodingOptions } from "./executor.js";
import { IterationBudget } from "./budget.js";
import { buildTaskGraph } from "./task-graph.js";
import { SandboxGateway } from "../sandbox/gateway.js";
import { Toolbox } from "../tools/toolbox.js";
import { ScriptedGenerator } from "../testing/scripted-generator.js";
import { createProject } from "../state/project.js";
import { resolveRunConfig, type RunConfigOverrides } from "../state/config.js";
import { ExternalServiceError, InterruptedError, StageFailedError } from "../errors.js";
import type { Plan, ProjectState } from "../state/types.js";

let tmp: string;
let gateway: SandboxGateway;

const plan: Plan = {
  name: "shapes",
  description: "",
  techStack: ["python"],
  features: [],
  files: [
    { path: "base.py", purpose: "base class" },
    { path: "circle.py", purpose: "circle shape" },
    { path: "util.py", purpose: "helpers" },
  ],
  requiredPackages: [],
};

function projectState(): ProjectState {
  const state = createProject({ prompt: "Shapes", name: "shapes", outputDir: tmp });
  const graph = buildTaskGraph(plan, {
    tasks: [
      { filePath: "base.py", instruction: "Shape base", dependsOn: [], priority: 0, complexity: "low" },
      { filePath: "circle.py", instruction: "Circle", dependsOn: ["base.py"], priority: 0, complexity: "low" },
      { filePath: "util.py", instruction: "Helpers", dependsOn: [], priority: 0, complexity: "low" },
    ],
  });
  if (!graph.ok) throw graph.error;
  state.plan = plan;
  state.taskGraph = graph.value;
  return state;
}

function options(
  generator: ScriptedGenerator,
  overrides: RunConfigOverrides = {},
  extra: Partial<CodingOptions> = {}
): CodingOptions & { saves: number[] } {
  const saves: number[] = [];
  const config = resolveRunConfig(
    null,
    { serviceRetries: 1, serviceRetryDelayMs: 0, generationTimeoutMs: 2000, ...overrides },
    { FORGELINE_HOME: tmp }
  );
  return {
    state: projectState(),
    generator,
    toolbox: new Toolbox({ gateway, plan, config, git: { run: async () => "" } }),
    budget: new IterationBudget(config.iterationBudget),
    config,
    checkpoint: async () => {
      saves.push(Date.now());
    },
    saves,
    ...extra,
  };
}

const write = (file: string) => JSON.stringify({ action: "write_file", path: file, content: "x = 1\n" });
const complete = (summary: string) => JSON.stringify({ action: "complete", summary });

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), "forgeline-exec-"));
  gateway = await SandboxGateway.create(path.join(tmp, "shapes"), { maxFileBytes: 1024 });
});

afterEach(async () => {
  await fs.rm(tmp, { recursive: true, force: true });
});

describe("runCoding", () => {
  it("runs every task in execution order and checkpoints after each", async () => {
    const generator = new ScriptedGenerator()
      .onTask("t1", write("base.py"), complete("base done"))
      .onTask("t2", write("circle.py"), complete("circle done"))
      .onTask("t3", write("util.py"), complete("util done"));
    const opts = options(generator);

    await runCoding(opts);

    expect(generator.requests.map((r) => r.taskId)).toEqual(["t1", "t1", "t3", "t3", "t2", "t2"]);
    expect(Object.values(opts.state.tasks).map((t) => t.status)).toEqual(["done", "done", "done"]);
    expect(opts.state.tasks.t2.summary).toBe("circle done");
    expect(opts.saves).toHaveLength(3);
    expect(opts.state.iterationsUsed).toBe(6);
    expect(await gateway.listDirectory()).toEqual(["base.py", "circle.py", "util.py"]);
  });

  it("tells a task what its dependencies produced", async () => {
    const generator = new ScriptedGenerator()
      .onTask("t1", complete("Shape base class with area()"))
      .onTask("t3", complete("helpers"))
      .onTask("t2", complete("circle"));

    await runCoding(options(generator));

    const prompt = generator.callsFor("coding", "t2")[0].messages[0].content;
    expect(prompt).toContain("Shape base class with area()");
  });

  it("fails dependents and stops dispatching under the abort policy", async () => {
    const generator = new ScriptedGenerator().onTask("t1", new ExternalServiceError("quota exceeded", false, 403));
    const opts = options(generator);

    const error = await runCoding(opts).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageFailedError);
    expect(error).toMatchObject({
      stage: "coding",
      taskId: "t1",
      reason: { kind: "ExternalServiceError", message: "quota exceeded" },
    });
    expect(opts.state.tasks.t2.status).toBe("failed");
    expect(opts.state.tasks.t2.error).toEqual({ kind: "StageFailed", message: "dependency t1 failed" });
    expect(opts.state.tasks.t3.status).toBe("pending");
    expect(generator.callsFor("coding", "t3")).toEqual([]);
  });

  it("keeps running independent tasks under the continue policy", async () => {
    const generator = new ScriptedGenerator()
      .onTask("t1", new ExternalServiceError("quota exceeded", false, 403))
      .onTask("t3", write("util.py"), complete("util done"));
    const opts = options(generator, { taskFailurePolicy: "continue" });

    await expect(runCoding(opts)).rejects.toMatchObject({ taskId: "t1" });

    expect(opts.state.tasks.t2.status).toBe("failed");
    expect(opts.state.tasks.t3.status).toBe("done");
    expect(opts.saves).toHaveLength(1);
  });

  it("never runs a task alongside its dependency", async () => {
    const running = new Set<string>();
    const snapshots: string[][] = [];
    const slow = (id: string) => async () => {
      running.add(id);
      snapshots.push([...running].sort());
      await new Promise((resolve) => setTimeout(resolve, 20));
      running.delete(id);
      return complete(`${id} done`);
    };
    const generator = new ScriptedGenerator()
      .onTask("t1", slow("t1"))
      .onTask("t2", slow("t2"))
      .onTask("t3", slow("t3"));

    await runCoding(options(generator, { maxParallel: 2 }));

    expect(snapshots[0]).toEqual(["t1"]);
    expect(snapshots[1]).toEqual(["t1", "t3"]);
    expect(snapshots.some((s) => s.includes("t1") && s.includes("t2"))).toBe(false);
    expect(snapshots.every((s) => s.length <= 2)).toBe(true);
  });

  it("reverts the running task to pending when cancelled", async () => {
    const controller = new AbortController();
    const generator = new ScriptedGenerator().onTask("t1", () => {
      controller.abort();
      return write("base.py");
    });
    const opts = options(generator, {}, { signal: controller.signal });

    await expect(runCoding(opts)).rejects.toBeInstanceOf(InterruptedError);

    expect(opts.state.tasks.t1.status).toBe("pending");
    expect(opts.state.tasks.t1.startedAt).toBeNull();
    expect(opts.state.tasks.t3.status).toBe("pending");
    expect(generator.callsFor("coding", "t3")).toEqual([]);
  });

  it("stops and rethrows when a checkpoint cannot be written", async () => {
    const generator = new ScriptedGenerator().onTask("t1", complete("base done"));
    const opts = options(generator, {}, {
      checkpoint: async () => {
        throw new Error("disk full");
      },
    });

    await expect(runCoding(opts)).rejects.toThrow("disk full");
    expect(opts.state.tasks.t1.status).toBe("done");
    expect(opts.state.tasks.t3.status).toBe("pending");
  });

  it("fails a task once the shared budget is spent", async () => {
    const list = JSON.stringify({ action: "list_directory" });
    const generator = new ScriptedGenerator().onTask("t1", list, list);
    const opts = options(generator, { iterationBudget: 2 });

    await expect(runCoding(opts)).rejects.toMatchObject({
      reason: { kind: "BudgetExhausted", message: "Iteration budget of 2 exhausted while working on t1" },
    });
    expect(opts.state.iterationsUsed).toBe(2);
  });
});
