import { z } from "zod";
import type { Plan } from "../state/types.js";

export type ManifestKind = "requirements" | "package-json";

const PYTHON_HINT = /python|django|flask|fastapi|pandas|pytest/i;
const NODE_HINT = /node|javascript|typescript|react|express|vue|next|svelte/i;

/**
 * Which dependency manifest a plan's stack uses: requirements.txt for
 * Python, package.json for JavaScript and TypeScript, null otherwise.
 */
export function manifestKind(plan: Plan): ManifestKind | null {
  const hints = [...plan.techStack, ...plan.files.map((f) => f.path)];
  if (hints.some((h) => PYTHON_HINT.test(h) || h.endsWith(".py"))) return "requirements";
  if (hints.some((h) => NODE_HINT.test(h) || /\.(c|m)?[jt]sx?$/.test(h))) return "package-json";
  return null;
}

export function manifestPath(kind: ManifestKind): string {
  return kind === "requirements" ? "requirements.txt" : "package.json";
}

/** Lower-cased package name without version specifiers or extras. */
export function packageBaseName(spec: string): string {
  const trimmed = spec.trim();
  const scoped = trimmed.startsWith("@");
  const body = scoped ? trimmed.slice(1) : trimmed;
  const [name] = body.split(/[<>=!~@\s[;]/);
  return `${scoped ? "@" : ""}${name}`.toLowerCase();
}

/** Version range carried by an npm-style spec (`zod@^3`), or "*". */
export function npmVersion(spec: string): string {
  const trimmed = spec.trim();
  const at = trimmed.indexOf("@", trimmed.startsWith("@") ? 1 : 0);
  return at > 0 && at < trimmed.length - 1 ? trimmed.slice(at + 1) : "*";
}

/** Append `spec` to requirements.txt content unless the package is already listed. */
export function addRequirement(existing: string, spec: string): { content: string; added: boolean } {
  const name = packageBaseName(spec);
  const lines = existing.split("\n").filter((line) => line.trim() !== "");
  const listed = lines.some((line) => !line.trim().startsWith("#") && packageBaseName(line) === name);
  if (listed) return { content: existing, added: false };
  return { content: [...lines, spec.trim()].join("\n") + "\n", added: true };
}

const PackageJsonSchema = z
  .object({ dependencies: z.record(z.string()).optional() })
  .passthrough();

/**
 * Add `spec` to package.json dependencies. `existing` is null when the
 * project has no package.json yet.
 */
export function addPackageJsonDependency(
  existing: string | null,
  spec: string,
  projectName: string
): { content: string; added: boolean } {
  const manifest =
    existing === null
      ? { name: npmName(projectName), version: "1.0.0", private: true, dependencies: {} }
      : PackageJsonSchema.parse(JSON.parse(existing));

  const name = packageBaseName(spec);
  const dependencies = { ...(manifest.dependencies ?? {}) };
  if (name in dependencies) {
    return { content: existing ?? JSON.stringify(manifest, null, 2) + "\n", added: false };
  }
  dependencies[name] = npmVersion(spec);
  return { content: JSON.stringify({ ...manifest, dependencies }, null, 2) + "\n", added: true };
}

function npmName(projectName: string): string {
  const slug = projectName
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^[-._]+|-+$/g, "");
  return slug || "generated-project";
}
