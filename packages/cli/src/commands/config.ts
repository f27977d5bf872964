/**
 * `forgeline config` command: get/set persisted defaults.
 */

import { Command } from "commander";
import { errorMessage } from "../errors.js";
import { CONFIG_KEYS, applyConfigValue, getConfigPath, isConfigKey, loadConfig, saveConfig } from "../state/config.js";
import * as logger from "../ui/logger.js";

export function configCommand(): Command {
  const cmd = new Command("config").description("Manage CLI configuration");

  cmd
    .command("set <key> <value>")
    .description("Set a configuration value")
    .action(async (key: string, value: string) => {
      try {
        if (!isConfigKey(key)) {
          logger.error(`Unknown config key: ${key}`);
          logger.info(`Valid keys: ${CONFIG_KEYS.join(", ")}`);
          process.exitCode = 1;
          return;
        }

        const config = applyConfigValue((await loadConfig()) ?? {}, key, value);
        await saveConfig(config);
        logger.success(`Set ${key} = ${String(config[key])}`);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exitCode = 1;
      }
    });

  cmd
    .command("get [key]")
    .description("Get a configuration value (or all values)")
    .action(async (key?: string) => {
      try {
        const config = await loadConfig();
        if (!config) {
          logger.warn(`No config found at ${getConfigPath()}`);
          return;
        }

        if (key) {
          if (!isConfigKey(key)) {
            logger.error(`Unknown config key: ${key}`);
            process.exitCode = 1;
            return;
          }
          const value = config[key];
          if (value === undefined) {
            logger.dim("(not set)");
          } else {
            console.log(String(value));
          }
        } else {
          for (const k of CONFIG_KEYS) {
            console.log(`  ${k}: ${String(config[k] ?? "(not set)")}`);
          }
        }
      } catch (error) {
        logger.error(errorMessage(error));
        process.exitCode = 1;
      }
    });

  cmd
    .command("path")
    .description("Show config file path")
    .action(() => {
      console.log(getConfigPath());
    });

  return cmd;
}
