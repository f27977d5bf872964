import type { Plan, TaskNode, ToolCallRecord } from "../state/types.js";

const MAX_RESULT_CHARS = 8000;

export interface CoderTools {
  git: boolean;
  webLookup: boolean;
  /** Packages the plan allows `install_dependency` for. */
  packages: string[];
}

export function buildCoderSystemPrompt(tools: CoderTools): string {
  const actions = [
    '{"action": "write_file", "path": "<relative path>", "content": "<full file content>"}',
    '{"action": "read_file", "path": "<relative path>"}',
    '{"action": "list_directory", "path": "."}',
    '{"action": "get_current_directory"}',
  ];
  if (tools.git) {
    actions.push('{"action": "git", "args": ["status"]}  (init, add, commit, status, log, diff, rev-parse)');
  }
  if (tools.packages.length > 0) {
    actions.push(`{"action": "install_dependency", "name": "<package>"}  (one of: ${tools.packages.join(", ")})`);
  }
  if (tools.webLookup) {
    actions.push('{"action": "web_lookup", "query": "<search terms>"}');
  }
  actions.push('{"action": "complete", "summary": "<what you implemented>"}');

  return `You are a software engineer implementing one file of a larger project inside a sandboxed project directory.

You act by replying with exactly one JSON object per turn, chosen from:
${actions.map((a) => `- ${a}`).join("\n")}

After each action you receive its result. All paths are relative to the project root; you cannot leave it.
Write complete file contents (never placeholders or diffs). When the file is finished, reply with "complete".`;
}

export function buildCoderTaskPrompt(
  task: TaskNode,
  plan: Plan,
  completedDeps: Array<{ taskId: string; filePath: string; summary: string | null }>
): string {
  let depContext = "";
  if (completedDeps.length > 0) {
    const depLines = completedDeps
      .map((d) => `- **${d.taskId}** (\`${d.filePath}\`): ${d.summary ?? "done"}`)
      .join("\n");
    depContext = `
## Completed Dependencies
These files already exist. Read them before relying on their API:

${depLines}
`;
  }

  return `## Task ${task.id}: \`${task.filePath}\`
Complexity: ${task.complexity}

## Instruction
${task.instruction}

## Project
${plan.name}: ${plan.description}
Tech stack: ${plan.techStack.join(", ") || "(unspecified)"}
Files: ${plan.files.map((f) => f.path).join(", ")}
${depContext}
Start now. Reply with one JSON action.`;
}

/** The follow-up user message describing a recorded tool call's outcome. */
export function formatToolResult(record: ToolCallRecord): string {
  if (record.call.action === "invalid") {
    return `Your reply was not a valid action:\n${record.error?.message ?? "unknown problem"}\nReply with exactly one JSON action.`;
  }
  if (!record.ok) {
    return `Error from ${record.call.action} (${record.error?.kind ?? "ToolExecutionError"}): ${record.error?.message ?? "unknown error"}`;
  }
  const output = record.output ?? "";
  const clipped =
    output.length > MAX_RESULT_CHARS ? `${output.slice(0, MAX_RESULT_CHARS)}\n[truncated]` : output;
  return `Result of ${record.call.action}:\n${clipped}`;
}

/** How the model's own turn is replayed in the conversation. */
export function formatToolCall(record: ToolCallRecord): string {
  return record.call.action === "invalid" ? record.call.raw : JSON.stringify(record.call);
}
