import * as path from "node:path";

const LANGUAGES: Record<string, string> = {
  ".py": "python",
  ".js": "javascript",
  ".jsx": "javascript",
  ".ts": "typescript",
  ".tsx": "typescript",
  ".java": "java",
  ".go": "go",
  ".rs": "rust",
  ".cpp": "c++",
  ".c": "c",
};

/** Languages the Tester writes tests for. */
const TESTABLE = new Set(["python", "javascript", "typescript"]);

export function languageFor(filePath: string): string | null {
  return LANGUAGES[path.posix.extname(filePath).toLowerCase()] ?? null;
}

export function isTestable(language: string | null): language is string {
  return language !== null && TESTABLE.has(language);
}

/** Files whose path mentions "test" are treated as tests themselves. */
export function isTestFile(filePath: string): boolean {
  return filePath.toLowerCase().includes("test");
}

/** `tests/test_<stem><ext>` for Python, `__tests__/test_<stem><ext>` otherwise. */
export function testPathFor(filePath: string, language: string): string {
  const ext = path.posix.extname(filePath);
  const stem = path.posix.basename(filePath, ext);
  const dir = language === "python" ? "tests" : "__tests__";
  return `${dir}/test_${stem}${ext}`;
}

export function commentPrefix(language: string): string {
  return language === "python" ? "#" : "//";
}
