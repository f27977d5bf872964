import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";
import { ValidationError, errnoCode, errorMessage } from "../errors.js";
import { KeyedLock } from "../util/keyed-lock.js";
import { CheckpointSchema, type Checkpoint } from "../validation/schemas.js";
import { formatIssues } from "../validation/structured-output.js";
import type { WorkStage } from "./types.js";

const PROJECT_ID = /^[A-Za-z0-9._-]+$/;

/** Everything a checkpoint holds besides its identity and stamp. */
export type CheckpointSnapshot = Omit<Checkpoint, "version" | "projectId" | "lastCompletedStage" | "timestamp">;

export interface CheckpointSummary {
  projectId: string;
  name: string;
  lastCompletedStage: WorkStage | null;
  timestamp: number;
  path: string;
}

/**
 * One JSON file per project under `dir`. Writes go to a temporary file that
 * is renamed over the previous checkpoint, so a reader never sees a partial
 * file. Saves for the same project are serialized.
 */
export class CheckpointStore {
  private readonly locks = new KeyedLock();

  constructor(readonly dir: string) {}

  pathFor(projectId: string): string {
    if (!PROJECT_ID.test(projectId) || projectId === "." || projectId === "..") {
      throw new Error(`Invalid project id: ${projectId}`);
    }
    return path.join(this.dir, `${projectId}.json`);
  }

  /** Write the checkpoint for `projectId` and return its path. */
  async save(projectId: string, stage: WorkStage | null, snapshot: CheckpointSnapshot): Promise<string> {
    const file = this.pathFor(projectId);
    const checkpoint: Checkpoint = {
      version: 1,
      projectId,
      lastCompletedStage: stage,
      ...snapshot,
      timestamp: Date.now(),
    };
    // Snapshot objects are shared with the live state; serialize before queueing.
    const data = JSON.stringify(checkpoint, null, 2) + "\n";
    return this.locks.run(projectId, async () => {
      await fs.mkdir(this.dir, { recursive: true });
      const tmp = `${file}.${crypto.randomUUID()}.tmp`;
      try {
        await fs.writeFile(tmp, data);
        await fs.rename(tmp, file);
      } catch (error) {
        await fs.rm(tmp, { force: true });
        throw error;
      }
      return file;
    });
  }

  /** Latest checkpoint for a project, or null if none was ever written. */
  async load(projectId: string): Promise<Checkpoint | null> {
    const file = this.pathFor(projectId);
    let data: string;
    try {
      data = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return null;
      throw error;
    }
    return parseCheckpoint(data, file);
  }

  /** Every readable checkpoint, newest first. Unreadable files are skipped. */
  async list(): Promise<CheckpointSummary[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return [];
      throw error;
    }

    const results: CheckpointSummary[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(".json")) continue;
      const file = path.join(this.dir, entry);
      try {
        const checkpoint = parseCheckpoint(await fs.readFile(file, "utf-8"), file);
        results.push({
          projectId: checkpoint.projectId,
          name: checkpoint.project.name,
          lastCompletedStage: checkpoint.lastCompletedStage,
          timestamp: checkpoint.timestamp,
          path: file,
        });
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
      }
    }
    return results.sort((a, b) => b.timestamp - a.timestamp);
  }

  /** Delete a project's checkpoint. False if there was none. */
  async remove(projectId: string): Promise<boolean> {
    const file = this.pathFor(projectId);
    return this.locks.run(projectId, async () => {
      try {
        await fs.unlink(file);
        return true;
      } catch (error) {
        if (errnoCode(error) === "ENOENT") return false;
        throw error;
      }
    });
  }
}

function parseCheckpoint(data: string, file: string): Checkpoint {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (error) {
    throw new ValidationError([`(root): ${errorMessage(error)}`], `checkpoint ${file}`);
  }
  const parsed = CheckpointSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error), `checkpoint ${file}`);
  }
  return parsed.data;
}
