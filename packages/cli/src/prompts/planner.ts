export const PLANNER_SYSTEM =
  "You are a senior software architect. You turn project requests into concrete file-level plans and answer with JSON only.";

export function buildPlannerPrompt(request: string, projectName: string): string {
  return `Plan a new software project.

## Project name
${projectName}

## Request
${request}

## Instructions

1. **Choose a small, conventional tech stack** that fits the request. Prefer the standard library where it is enough.

2. **List every file the project needs**, in the order they should be written. Each file has a relative \`path\` (forward slashes, no leading "./") and a one-sentence \`purpose\`. Do not list test files; tests are generated separately.

3. **List third-party packages** in \`requiredPackages\` using the package manager's own spelling (e.g. "requests>=2.31" or "express@^4.19.0"). Leave it empty when none are needed.

4. **Output your plan as JSON** in a \`\`\`json code fence matching this schema:

\`\`\`json
{
  "name": "${projectName}",
  "description": "What the project does, in one or two sentences",
  "techStack": ["python"],
  "features": ["Feature one", "Feature two"],
  "files": [
    { "path": "main.py", "purpose": "Entry point that wires everything together" }
  ],
  "requiredPackages": []
}
\`\`\`

Only \`name\` and \`files\` are required, and \`files\` must not be empty.`;
}
