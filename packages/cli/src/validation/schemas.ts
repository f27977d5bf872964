import { z } from "zod";
import { ERROR_KINDS } from "../errors.js";

const PlanFileSchema = z.object({
  path: z.string().min(1),
  purpose: z.string().min(1),
});

/**
 * Planner output. Only `name` and `files` are required; models routinely
 * omit the descriptive fields for small projects.
 */
export const PlanSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  techStack: z.array(z.string()).default([]),
  features: z.array(z.string()).default([]),
  files: z.array(PlanFileSchema).min(1),
  requiredPackages: z.array(z.string().min(1)).default([]),
});

export const ComplexitySchema = z.enum(["low", "medium", "high"]);

/** One Architect task. `dependsOn` lists file paths from the plan, not task ids. */
export const ArchitectTaskSchema = z.object({
  filePath: z.string().min(1),
  instruction: z.string().min(1),
  dependsOn: z.array(z.string().min(1)).default([]),
  priority: z.number().int().default(0),
  complexity: ComplexitySchema.default("medium"),
});

export const ArchitectOutputSchema = z.object({
  tasks: z.array(ArchitectTaskSchema).min(1),
});

const WriteFileSchema = z.object({ action: z.literal("write_file"), path: z.string().min(1), content: z.string() });
const ReadFileSchema = z.object({ action: z.literal("read_file"), path: z.string().min(1) });
const ListDirectorySchema = z.object({ action: z.literal("list_directory"), path: z.string().min(1).default(".") });
const CurrentDirectorySchema = z.object({ action: z.literal("get_current_directory") });
const GitSchema = z.object({ action: z.literal("git"), args: z.array(z.string()).min(1) });
const InstallDependencySchema = z.object({ action: z.literal("install_dependency"), name: z.string().min(1) });
const WebLookupSchema = z.object({ action: z.literal("web_lookup"), query: z.string().min(1) });
const CompleteSchema = z.object({ action: z.literal("complete"), summary: z.string().default("") });

/** One Coder turn: a tool call, or `complete` to finish the task. */
export const CoderActionSchema = z.discriminatedUnion("action", [
  WriteFileSchema,
  ReadFileSchema,
  ListDirectorySchema,
  CurrentDirectorySchema,
  GitSchema,
  InstallDependencySchema,
  WebLookupSchema,
  CompleteSchema,
]);

export const QualityReportSchema = z.object({
  filePath: z.string().min(1),
  score: z.number().int().min(0).max(100),
  issues: z.array(z.string()).default([]),
  suggestions: z.array(z.string()).default([]),
  approved: z.boolean(),
});

export const TestCaseSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  code: z.string().min(1),
});

export const TestPlanSchema = z.object({
  filePath: z.string().min(1),
  framework: z.string().min(1),
  testCases: z.array(TestCaseSchema).min(1),
});

const ToolCallSchema = z.discriminatedUnion("action", [
  WriteFileSchema,
  ReadFileSchema,
  ListDirectorySchema,
  CurrentDirectorySchema,
  GitSchema,
  InstallDependencySchema,
  WebLookupSchema,
]);

const ErrorInfoSchema = z.object({
  kind: z.enum(ERROR_KINDS),
  message: z.string(),
});

const ToolCallRecordSchema = z.object({
  call: z.union([ToolCallSchema, z.object({ action: z.literal("invalid"), raw: z.string() })]),
  ok: z.boolean(),
  output: z.string().nullable(),
  error: ErrorInfoSchema.nullable(),
  durationMs: z.number(),
});

const TaskExecutionSchema = z.object({
  taskId: z.string(),
  status: z.enum(["pending", "in_progress", "done", "failed"]),
  startedAt: z.number().nullable().default(null),
  completedAt: z.number().nullable().default(null),
  iterations: z.number().int().nonnegative().default(0),
  summary: z.string().nullable().default(null),
  error: ErrorInfoSchema.nullable().default(null),
  history: z.array(ToolCallRecordSchema).default([]),
});

const TaskNodeSchema = z.object({
  id: z.string().min(1),
  filePath: z.string().min(1),
  instruction: z.string(),
  dependsOn: z.array(z.string()),
  priority: z.number().int(),
  complexity: ComplexitySchema,
});

const TestArtifactSchema = z.object({
  filePath: z.string(),
  testPath: z.string(),
  framework: z.string(),
  testCases: z.array(TestCaseSchema),
});

const ProjectMetadataSchema = z.object({
  projectName: z.string(),
  createdAt: z.number(),
  completedAt: z.number(),
  filesCreated: z.array(z.string()),
  totalLines: z.number().int().nonnegative(),
  packages: z.array(z.string()),
  gitInitialized: z.boolean(),
  dockerEnabled: z.boolean(),
  testsGenerated: z.boolean(),
});

export const WorkStageSchema = z.enum(["planning", "architecting", "coding", "reviewing", "testing", "finalizing"]);

/**
 * On-disk checkpoint. Written after every committed stage and every completed
 * coding task; enough to resume from the next stage without redoing work.
 */
export const CheckpointSchema = z.object({
  version: z.literal(1),
  projectId: z.string().min(1),
  lastCompletedStage: WorkStageSchema.nullable(),
  project: z.object({
    name: z.string().min(1),
    rootDir: z.string().min(1),
    prompt: z.string(),
    createdAt: z.number(),
  }),
  plan: PlanSchema.nullable().default(null),
  taskGraph: z
    .object({
      tasks: z.array(TaskNodeSchema),
      order: z.array(z.string()),
    })
    .nullable()
    .default(null),
  taskStatuses: z.record(z.string(), TaskExecutionSchema).default({}),
  reviews: z.array(QualityReportSchema).default([]),
  testArtifacts: z.array(TestArtifactSchema).default([]),
  metadata: ProjectMetadataSchema.nullable().default(null),
  iterationsUsed: z.number().int().nonnegative().default(0),
  timestamp: z.number(),
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;
export type Plan = z.infer<typeof PlanSchema>;
export type Complexity = z.infer<typeof ComplexitySchema>;
export type ArchitectTask = z.infer<typeof ArchitectTaskSchema>;
export type ArchitectOutput = z.infer<typeof ArchitectOutputSchema>;
export type CoderAction = z.infer<typeof CoderActionSchema>;
export type QualityReport = z.infer<typeof QualityReportSchema>;
export type TestCase = z.infer<typeof TestCaseSchema>;
export type TestPlan = z.infer<typeof TestPlanSchema>;

/** Actions that perform a tool call; everything except the loop-control `complete`. */
export type ToolCall = Exclude<CoderAction, { action: "complete" }>;
