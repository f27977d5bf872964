/**
 * Type definitions for pipeline state.
 */

import type { ErrorKind } from "../errors.js";
import type {
  Complexity,
  Plan,
  QualityReport,
  TestCase,
  ToolCall,
} from "../validation/schemas.js";

export type { Plan, QualityReport, ToolCall } from "../validation/schemas.js";

export type Stage =
  | "planning"
  | "architecting"
  | "coding"
  | "reviewing"
  | "testing"
  | "finalizing"
  | "done"
  | "failed";

/** Stages that perform work; `done` and `failed` are terminal. */
export type WorkStage = Exclude<Stage, "done" | "failed">;

export const STAGE_ORDER: readonly WorkStage[] = [
  "planning",
  "architecting",
  "coding",
  "reviewing",
  "testing",
  "finalizing",
];

export type ProjectStatus = "pending" | "running" | "succeeded" | "failed" | "interrupted";

export type TaskStatus = "pending" | "in_progress" | "done" | "failed";

export type Provider = "gemini" | "anthropic" | "openai";

export type TaskFailurePolicy = "abort" | "continue";

export type LogLevel = "silent" | "info" | "debug";

/**
 * Immutable run configuration, threaded through the pipeline constructor.
 */
export interface RunConfig {
  readonly provider: Provider;
  readonly model: string;
  readonly stageModels: Readonly<Partial<Record<WorkStage, string>>>;
  readonly outputDir: string;
  readonly checkpointDir: string;
  readonly enableReview: boolean;
  readonly enableTesting: boolean;
  readonly enableGit: boolean;
  readonly enableDocker: boolean;
  readonly enableWebSearch: boolean;
  /** Reasoning iterations shared by every task of a run. */
  readonly iterationBudget: number;
  /** Re-invocations of a stage after a validation failure. */
  readonly maxStageRetries: number;
  readonly maxParallel: number;
  readonly generationTimeoutMs: number;
  readonly toolTimeoutMs: number;
  /** Attempts (including the first) for a generator call that fails transiently. */
  readonly serviceRetries: number;
  /** Base delay of the exponential backoff between those attempts. */
  readonly serviceRetryDelayMs: number;
  readonly taskFailurePolicy: TaskFailurePolicy;
  readonly maxFileBytes: number;
  readonly logLevel: LogLevel;
}

export interface TaskNode {
  id: string;
  filePath: string;
  instruction: string;
  /** Task ids, resolved from the file paths the Architect declared. */
  dependsOn: string[];
  priority: number;
  complexity: Complexity;
}

export interface TaskGraph {
  /** Tasks in the order the Architect listed them. */
  tasks: TaskNode[];
  /** Task ids in execution order. */
  order: string[];
}

export interface ToolCallRecord {
  call: ToolCall | { action: "invalid"; raw: string };
  ok: boolean;
  output: string | null;
  error: { kind: ErrorKind; message: string } | null;
  durationMs: number;
}

export interface TaskExecution {
  taskId: string;
  status: TaskStatus;
  startedAt: number | null;
  completedAt: number | null;
  iterations: number;
  summary: string | null;
  error: { kind: ErrorKind; message: string } | null;
  history: ToolCallRecord[];
}

export interface TestArtifact {
  filePath: string;
  testPath: string;
  framework: string;
  testCases: TestCase[];
}

export interface ProjectMetadata {
  projectName: string;
  createdAt: number;
  completedAt: number;
  filesCreated: string[];
  totalLines: number;
  packages: string[];
  gitInitialized: boolean;
  dockerEnabled: boolean;
  testsGenerated: boolean;
}

export interface FailureRecord {
  stage: WorkStage;
  kind: ErrorKind;
  message: string;
  taskId: string | null;
}

export interface ProjectState {
  id: string;
  name: string;
  /** Absolute sandbox root; every file tool is confined to it. */
  rootDir: string;
  prompt: string;
  createdAt: number;
  updatedAt: number;
  stage: Stage;
  status: ProjectStatus;
  lastCompletedStage: WorkStage | null;
  plan: Plan | null;
  taskGraph: TaskGraph | null;
  tasks: Record<string, TaskExecution>;
  reviews: QualityReport[];
  testArtifacts: TestArtifact[];
  metadata: ProjectMetadata | null;
  iterationsUsed: number;
  failure: FailureRecord | null;
  checkpointPath: string | null;
}
