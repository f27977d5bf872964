import { describe, it, expect } from "vitest";
import { validateStructuredOutput } from "./structured-output.js";
import { CoderActionSchema, PlanSchema, QualityReportSchema } from "./schemas.js";
import { ValidationError } from "../errors.js";

describe("validateStructuredOutput", () => {
  it("parses a fenced plan and fills defaults", () => {
    const raw = `Plan:
\`\`\`json
{"name": "calc", "files": [{"path": "calculator.py", "purpose": "arithmetic"}]}
\`\`\``;
    const result = validateStructuredOutput(raw, PlanSchema, "plan");
    expect(result).toEqual({
      ok: true,
      value: {
        name: "calc",
        description: "",
        techStack: [],
        features: [],
        files: [{ path: "calculator.py", purpose: "arithmetic" }],
        requiredPackages: [],
      },
    });
  });

  it("validates an already-parsed value", () => {
    const result = validateStructuredOutput(
      { action: "read_file", path: "main.py" },
      CoderActionSchema
    );
    expect(result).toEqual({ ok: true, value: { action: "read_file", path: "main.py" } });
  });

  it("enumerates every violated field", () => {
    const result = validateStructuredOutput('{"files": []}', PlanSchema, "plan");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.issues).toEqual([
      "name: Required",
      "files: Array must contain at least 1 element(s)",
    ]);
    expect(result.error.message).toBe(
      "Invalid plan: name: Required; files: Array must contain at least 1 element(s)"
    );
  });

  it("reports nested paths", () => {
    const result = validateStructuredOutput(
      { filePath: "a.py", score: 140, approved: true },
      QualityReportSchema
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toEqual(["score: Number must be less than or equal to 100"]);
  });

  it("reports output that holds no JSON at the root", () => {
    const result = validateStructuredOutput("I could not do that.", PlanSchema);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toEqual(["(root): no JSON object or array found in output"]);
  });

  it("rejects an unknown coder action", () => {
    const result = validateStructuredOutput('{"action": "delete_file", "path": "x"}', CoderActionSchema);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toHaveLength(1);
    expect(result.error.issues[0]).toMatch(/^action: Invalid discriminator value/);
  });

  it("is idempotent", () => {
    const raw = '{"name": "calc", "files": [{"path": "a.py", "purpose": "x"}]}';
    const first = validateStructuredOutput(raw, PlanSchema);
    const second = validateStructuredOutput(raw, PlanSchema);
    expect(second).toEqual(first);
  });

  it("formats feedback as a bullet list", () => {
    const error = new ValidationError(["name: Required", "files: Required"]);
    expect(error.toFeedback()).toBe("- name: Required\n- files: Required");
  });
});
