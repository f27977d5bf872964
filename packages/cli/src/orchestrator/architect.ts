/**
 * Stage 2: Architecting
 *
 * Turns the plan into a validated task graph. A graph that cannot be built
 * (unknown dependency, cycle) counts as invalid output and is retried with
 * the same feedback as a schema violation.
 */

import type { Plan, TaskGraph } from "../state/types.js";
import { ARCHITECT_SYSTEM, buildArchitectPrompt } from "../prompts/architect.js";
import { ArchitectOutputSchema } from "../validation/schemas.js";
import { validateStructuredOutput, type ValidationResult } from "../validation/structured-output.js";
import * as logger from "../ui/logger.js";
import { runStructuredStage, type StageContext } from "./structured-stage.js";
import { buildTaskGraph } from "./task-graph.js";

export async function runArchitecting(context: StageContext, plan: Plan): Promise<TaskGraph> {
  const graph = await runStructuredStage(context, {
    stage: "architecting",
    system: ARCHITECT_SYSTEM,
    prompt: buildArchitectPrompt(plan),
    label: "Task graph",
    interpret: (raw): ValidationResult<TaskGraph> => {
      const output = validateStructuredOutput(raw, ArchitectOutputSchema, "architect output");
      return output.ok ? buildTaskGraph(plan, output.value) : output;
    },
  });

  logger.info(`Task graph: ${graph.tasks.length} tasks`);
  return graph;
}
