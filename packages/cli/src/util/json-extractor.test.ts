import { describe, it, expect } from "vitest";
import { extractJson } from "./json-extractor.js";

describe("extractJson", () => {
  it("extracts JSON from a ```json code fence", () => {
    const text = `Here is the plan:
\`\`\`json
{"name": "calc", "files": []}
\`\`\`
That's the plan.`;
    expect(extractJson(text)).toEqual({ ok: true, value: { name: "calc", files: [] } });
  });

  it("extracts JSON from a ``` code fence without language tag", () => {
    const text = `Output:
\`\`\`
{"key": "value"}
\`\`\``;
    expect(extractJson(text)).toEqual({ ok: true, value: { key: "value" } });
  });

  it("skips a fence that does not hold JSON and uses the next one", () => {
    const text = `\`\`\`
print("hi")
\`\`\`
\`\`\`json
{"action": "complete"}
\`\`\``;
    expect(extractJson(text)).toEqual({ ok: true, value: { action: "complete" } });
  });

  it("extracts a raw JSON object from text", () => {
    const text = `The result is {"name": "test", "count": 42} and that's it.`;
    expect(extractJson(text)).toEqual({ ok: true, value: { name: "test", count: 42 } });
  });

  it("extracts a raw JSON array from text", () => {
    expect(extractJson("Items: [1, 2, 3]")).toEqual({ ok: true, value: [1, 2, 3] });
  });

  it("moves past an unparseable brace span to a later object", () => {
    const text = `Using {placeholder} syntax. Answer: {"action": "read_file", "path": "a.py"}`;
    expect(extractJson(text)).toEqual({
      ok: true,
      value: { action: "read_file", path: "a.py" },
    });
  });

  it("handles strings with escaped quotes", () => {
    const result = extractJson('{"message": "He said \\"hello\\""}');
    expect(result).toEqual({ ok: true, value: { message: 'He said "hello"' } });
  });

  it("handles strings with braces inside", () => {
    const result = extractJson('{"content": "def f():\\n    return {}"}');
    expect(result).toEqual({ ok: true, value: { content: "def f():\n    return {}" } });
  });

  it("reports an empty string", () => {
    expect(extractJson("")).toEqual({ ok: false, reason: "output is empty" });
  });

  it("reports text with no JSON", () => {
    expect(extractJson("This is just plain text.")).toEqual({
      ok: false,
      reason: "no JSON object or array found in output",
    });
  });

  it("reports unbalanced braces", () => {
    expect(extractJson("{ missing close brace").ok).toBe(false);
  });

  it("prefers code fence over raw JSON", () => {
    const text = `{"wrong": true}
\`\`\`json
{"correct": true}
\`\`\``;
    expect(extractJson(text)).toEqual({ ok: true, value: { correct: true } });
  });
});
