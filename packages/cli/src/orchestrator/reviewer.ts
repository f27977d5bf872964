/**
 * Stage 4: Reviewing (optional)
 *
 * One quality report per plan file that was written. A file whose review
 * cannot be obtained is skipped; this stage never fails the run on its own.
 */

import { InterruptedError, errorMessage } from "../errors.js";
import { REVIEWER_SYSTEM, buildReviewerPrompt } from "../prompts/reviewer.js";
import type { SandboxGateway } from "../sandbox/gateway.js";
import type { Plan, QualityReport } from "../state/types.js";
import * as logger from "../ui/logger.js";
import { languageFor } from "../util/languages.js";
import { QualityReportSchema } from "../validation/schemas.js";
import { validateStructuredOutput } from "../validation/structured-output.js";
import { runStructuredStage, type StageContext } from "./structured-stage.js";

export async function runReviewing(
  context: StageContext,
  plan: Plan,
  gateway: SandboxGateway
): Promise<QualityReport[]> {
  const reports: QualityReport[] = [];

  for (const file of plan.files) {
    if (!(await gateway.exists(file.path))) {
      logger.dim(`Not reviewing ${file.path}: file was not written`);
      continue;
    }

    try {
      const code = await gateway.readFile(file.path);
      const report = await runStructuredStage(context, {
        stage: "reviewing",
        system: REVIEWER_SYSTEM,
        prompt: buildReviewerPrompt(file, code, languageFor(file.path)),
        label: `Review of ${file.path}`,
        interpret: (raw) => validateStructuredOutput(raw, QualityReportSchema, "review"),
      });
      reports.push({ ...report, filePath: file.path });
      const verdict = report.approved ? "approved" : "changes suggested";
      logger.info(`${file.path}: ${report.score}/100, ${verdict}`);
    } catch (error) {
      if (error instanceof InterruptedError) throw error;
      logger.warn(`Skipping review of ${file.path}: ${errorMessage(error)}`);
    }
  }

  return reports;
}
