/**
 * Stage 5: Testing (optional)
 *
 * Asks for a test plan per source file and writes it to the conventional test
 * location through the Toolbox, so test files obey the same sandbox rules as
 * generated code. Files that fail are skipped.
 */

import { InterruptedError, errorMessage } from "../errors.js";
import { TESTER_SYSTEM, buildTesterPrompt } from "../prompts/tester.js";
import type { SandboxGateway } from "../sandbox/gateway.js";
import type { Plan, TestArtifact } from "../state/types.js";
import type { Toolbox } from "../tools/toolbox.js";
import * as logger from "../ui/logger.js";
import { commentPrefix, isTestFile, isTestable, languageFor, testPathFor } from "../util/languages.js";
import { TestPlanSchema, type TestPlan } from "../validation/schemas.js";
import { validateStructuredOutput } from "../validation/structured-output.js";
import { runStructuredStage, type StageContext } from "./structured-stage.js";

export async function runTesting(
  context: StageContext,
  plan: Plan,
  gateway: SandboxGateway,
  toolbox: Toolbox
): Promise<TestArtifact[]> {
  const artifacts: TestArtifact[] = [];

  for (const file of plan.files) {
    const language = languageFor(file.path);
    if (isTestFile(file.path) || !isTestable(language)) continue;
    if (!(await gateway.exists(file.path))) continue;

    const testPath = testPathFor(file.path, language);
    try {
      const code = await gateway.readFile(file.path);
      const testPlan = await runStructuredStage(context, {
        stage: "testing",
        system: TESTER_SYSTEM,
        prompt: buildTesterPrompt(file.path, code, language, testPath),
        label: `Tests for ${file.path}`,
        interpret: (raw) => validateStructuredOutput(raw, TestPlanSchema, "test plan"),
      });

      const record = await toolbox.execute(
        { action: "write_file", path: testPath, content: renderTestFile(file.path, testPlan, language) },
        context.signal
      );
      if (!record.ok) {
        logger.warn(`Could not write ${testPath}: ${record.error?.message ?? "unknown error"}`);
        continue;
      }

      artifacts.push({ filePath: file.path, testPath, framework: testPlan.framework, testCases: testPlan.testCases });
      logger.info(`${testPath}: ${testPlan.testCases.length} test cases (${testPlan.framework})`);
    } catch (error) {
      if (error instanceof InterruptedError) throw error;
      logger.warn(`Skipping tests for ${file.path}: ${errorMessage(error)}`);
    }
  }

  return artifacts;
}

/** Test cases joined into one file, each under a comment naming it. */
export function renderTestFile(filePath: string, testPlan: TestPlan, language: string): string {
  const c = commentPrefix(language);
  const sections = testPlan.testCases.map((testCase) => {
    const lines = [`${c} Test: ${testCase.name}`];
    if (testCase.description) lines.push(`${c} ${testCase.description}`);
    lines.push(testCase.code.trimEnd());
    return lines.join("\n");
  });
  return `${c} Generated tests for ${filePath}\n\n${sections.join("\n\n")}\n`;
}
