export const REVIEWER_SYSTEM =
  "You are a code reviewer. You assess one file at a time and answer with JSON only.";

export function buildReviewerPrompt(
  file: { path: string; purpose: string },
  code: string,
  language: string | null
): string {
  return `Review this file.

File: ${file.path}
Purpose: ${file.purpose}
Language: ${language ?? "unknown"}

\`\`\`
${code}
\`\`\`

Cover readability, correctness and edge cases, security (input validation, injection), performance, and documentation.

Output JSON in a \`\`\`json code fence:

\`\`\`json
{
  "filePath": "${file.path}",
  "score": 85,
  "issues": ["Specific problem"],
  "suggestions": ["Actionable improvement"],
  "approved": true
}
\`\`\`

\`score\` is an integer from 0 to 100. Approve when the file does its job without bugs.`;
}
