import type { Plan } from "../state/types.js";

export const ARCHITECT_SYSTEM =
  "You are a software architect. You break a project plan into ordered implementation tasks and answer with JSON only.";

export function buildArchitectPrompt(plan: Plan): string {
  const files = plan.files.map((f) => `- \`${f.path}\`: ${f.purpose}`).join("\n");
  const stack = plan.techStack.length > 0 ? plan.techStack.join(", ") : "(unspecified)";
  const features = plan.features.length > 0 ? plan.features.map((f) => `- ${f}`).join("\n") : "- (none listed)";

  return `Turn this project plan into implementation tasks.

## Project: ${plan.name}
${plan.description}

Tech stack: ${stack}

## Features
${features}

## Files
${files}

## Instructions

1. Create **one task per file** above. \`filePath\` must be exactly one of the listed paths.
2. Write a detailed \`instruction\` for each task: what the file must contain, which functions or classes it defines, and how it uses the other files.
3. In \`dependsOn\`, list the **file paths** whose contents this file imports or relies on. Only reference files from the list above, never the task's own file, and never create cycles.
4. Use \`priority\` (lower runs first, default 0) to order tasks that do not depend on each other, and rate \`complexity\` as "low", "medium" or "high".
5. Output JSON in a \`\`\`json code fence matching this schema:

\`\`\`json
{
  "tasks": [
    {
      "filePath": "utils.py",
      "instruction": "Implement helper functions ...",
      "dependsOn": [],
      "priority": 0,
      "complexity": "low"
    }
  ]
}
\`\`\``;
}
