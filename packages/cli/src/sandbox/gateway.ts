import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { PathViolation, ToolExecutionError, errnoCode } from "../errors.js";
import { KeyedLock } from "../util/keyed-lock.js";

export interface GatewayOptions {
  maxFileBytes: number;
}

const SKIPPED_DIRS = new Set([".git", "node_modules"]);
const MAX_LINK_DEPTH = 40;

/**
 * Every file operation of a run goes through here. Paths are interpreted
 * relative to the project root and must stay inside it, both lexically and
 * after following symlinks.
 */
export class SandboxGateway {
  private readonly locks = new KeyedLock();

  private constructor(
    readonly root: string,
    private readonly options: GatewayOptions
  ) {}

  /** Create the root directory if needed and canonicalize it. */
  static async create(root: string, options: GatewayOptions): Promise<SandboxGateway> {
    await fs.mkdir(root, { recursive: true });
    const canonical = await fs.realpath(root);
    return new SandboxGateway(canonical, options);
  }

  /**
   * Absolute path for `requested`, or PathViolation. Never touches the
   * filesystem beyond reading it.
   */
  async resolve(requested: string): Promise<string> {
    if (requested.includes("\0")) {
      throw new PathViolation(requested.replace(/\0/g, "\\0"), this.root);
    }
    const target = path.resolve(this.root, requested);
    if (!this.contains(target)) {
      throw new PathViolation(requested, this.root);
    }

    await this.checkLinks(requested, target);
    return target;
  }

  /** Write `content`, creating parent directories. Returns bytes written. */
  writeFile(requested: string, content: string): Promise<number> {
    return this.locks.run(path.resolve(this.root, requested), async () => {
      const target = await this.resolve(requested);
      const bytes = Buffer.byteLength(content, "utf-8");
      if (bytes > this.options.maxFileBytes) {
        throw new ToolExecutionError(
          `Refusing to write ${requested}: ${bytes} bytes exceeds the ${this.options.maxFileBytes} byte limit`,
          "write_file",
          "rejected"
        );
      }
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, "utf-8");
      return bytes;
    });
  }

  async readFile(requested: string): Promise<string> {
    const target = await this.resolve(requested);
    try {
      return await fs.readFile(target, "utf-8");
    } catch (error) {
      const code = errnoCode(error);
      if (code === "ENOENT") {
        throw new ToolExecutionError(`File not found: ${requested}`, "read_file", "not_found");
      }
      if (code === "EISDIR") {
        throw new ToolExecutionError(`Is a directory: ${requested}`, "read_file", "rejected");
      }
      throw error;
    }
  }

  /** Files under `requested`, recursively, relative to the root and sorted. */
  async listDirectory(requested = "."): Promise<string[]> {
    const target = await this.resolve(requested);
    const files: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        if (entry.isDirectory()) {
          if (!SKIPPED_DIRS.has(entry.name)) {
            await walk(path.join(dir, entry.name));
          }
        } else if (entry.isFile()) {
          files.push(this.relative(path.join(dir, entry.name)));
        }
      }
    };

    try {
      await walk(target);
    } catch (error) {
      const code = errnoCode(error);
      if (code === "ENOENT") {
        throw new ToolExecutionError(`Directory not found: ${requested}`, "list_directory", "not_found");
      }
      if (code === "ENOTDIR") {
        throw new ToolExecutionError(`Not a directory: ${requested}`, "list_directory", "rejected");
      }
      throw error;
    }
    return files.sort();
  }

  currentDirectory(): string {
    return ".";
  }

  async exists(requested: string): Promise<boolean> {
    const target = await this.resolve(requested);
    try {
      await fs.access(target);
      return true;
    } catch {
      return false;
    }
  }

  /** Root-relative, forward-slash form of an absolute path. */
  relative(absolute: string): string {
    return path.relative(this.root, absolute).split(path.sep).join("/");
  }

  private contains(candidate: string): boolean {
    return candidate === this.root || candidate.startsWith(this.root + path.sep);
  }

  /**
   * Walk `target` from the root with lstat. A symlink must point inside the
   * root whether or not its target exists; the remainder is then checked
   * against the link's target.
   */
  private async checkLinks(requested: string, target: string, depth = 0): Promise<void> {
    if (depth > MAX_LINK_DEPTH) {
      throw new PathViolation(requested, this.root);
    }
    const segments = path.relative(this.root, target).split(path.sep).filter(Boolean);
    let current = this.root;
    for (let i = 0; i < segments.length; i++) {
      const next = path.join(current, segments[i]);
      let stat: Stats;
      try {
        stat = await fs.lstat(next);
      } catch (error) {
        const code = errnoCode(error);
        if (code === "ENOENT" || code === "ENOTDIR") return;
        throw error;
      }
      if (stat.isSymbolicLink()) {
        const linked = path.resolve(current, await fs.readlink(next));
        if (!this.contains(linked)) {
          throw new PathViolation(requested, this.root);
        }
        return this.checkLinks(requested, path.join(linked, ...segments.slice(i + 1)), depth + 1);
      }
      current = next;
    }
  }
}
