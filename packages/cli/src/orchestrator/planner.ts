/**
 * Stage 1: Planning
 *
 * Sends the user's request to the Planner and validates the plan it returns.
 */

import type { Plan, ProjectState } from "../state/types.js";
import { PLANNER_SYSTEM, buildPlannerPrompt } from "../prompts/planner.js";
import { PlanSchema } from "../validation/schemas.js";
import { validateStructuredOutput } from "../validation/structured-output.js";
import * as logger from "../ui/logger.js";
import { runStructuredStage, type StageContext } from "./structured-stage.js";

export async function runPlanning(context: StageContext, state: ProjectState): Promise<Plan> {
  const plan = await runStructuredStage(context, {
    stage: "planning",
    system: PLANNER_SYSTEM,
    prompt: buildPlannerPrompt(state.prompt, state.name),
    label: "Plan",
    interpret: (raw) => validateStructuredOutput(raw, PlanSchema, "plan"),
  });

  logger.info(`Plan: ${plan.files.length} files, ${plan.requiredPackages.length} packages`);
  return plan;
}
