export const TESTER_SYSTEM =
  "You are a test engineer. You write unit tests for one file at a time and answer with JSON only.";

const FRAMEWORKS: Record<string, string> = {
  python: "pytest",
  javascript: "jest",
  typescript: "jest",
};

export function suggestedFramework(language: string): string {
  return FRAMEWORKS[language] ?? "the standard framework for the language";
}

export function buildTesterPrompt(filePath: string, code: string, language: string, testPath: string): string {
  return `Write unit tests for this file.

File: ${filePath}
Language: ${language}
Tests will be saved to: ${testPath}

\`\`\`
${code}
\`\`\`

Cover the main behaviour, edge cases and error handling. Use ${suggestedFramework(language)}.
Each test case's \`code\` must be complete and runnable on its own, including its imports relative to ${testPath}.

Output JSON in a \`\`\`json code fence:

\`\`\`json
{
  "filePath": "${filePath}",
  "framework": "${suggestedFramework(language)}",
  "testCases": [
    { "name": "test_adds_numbers", "description": "What it checks", "code": "..." }
  ]
}
\`\`\``;
}
