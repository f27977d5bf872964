/**
 * `forgeline clean` command: delete a project's checkpoint and, with
 * `--files`, its generated directory.
 */

import * as fs from "node:fs/promises";
import { Command } from "commander";
import { errorMessage } from "../errors.js";
import { CheckpointStore } from "../state/checkpoint.js";
import { loadConfig, resolveRunConfig } from "../state/config.js";
import * as logger from "../ui/logger.js";

export function cleanCommand(): Command {
  return new Command("clean")
    .description("Remove a project's checkpoint")
    .argument("<id>", "Project ID")
    .option("--files", "Also delete the generated project directory")
    .action(async (id: string, opts: { files?: boolean }) => {
      try {
        const config = resolveRunConfig(await loadConfig());
        const removed = await cleanProject(new CheckpointStore(config.checkpointDir), id, opts.files ?? false);
        if (!removed.checkpoint) {
          logger.error(`Project not found: ${id}`);
          process.exitCode = 1;
          return;
        }
        logger.success(`Removed checkpoint for ${id}`);
        if (removed.rootDir) logger.success(`Deleted ${removed.rootDir}`);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exitCode = 1;
      }
    });
}

export async function cleanProject(
  store: CheckpointStore,
  id: string,
  files: boolean
): Promise<{ checkpoint: boolean; rootDir: string | null }> {
  const checkpoint = await store.load(id);
  if (!checkpoint) return { checkpoint: false, rootDir: null };

  let rootDir: string | null = null;
  if (files) {
    rootDir = checkpoint.project.rootDir;
    await fs.rm(rootDir, { recursive: true, force: true });
  }
  await store.remove(id);
  return { checkpoint: true, rootDir };
}
