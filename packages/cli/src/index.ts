#!/usr/bin/env node
/**
 * Forgeline CLI: staged project generator.
 *
 * Usage:
 *   forgeline generate "A todo REST API with SQLite" --name todo-api
 *   forgeline generate --resume <id>
 *   forgeline status [id]
 *   forgeline config set provider anthropic
 *   forgeline clean <id> --files
 */

import "dotenv/config";
import { Command } from "commander";
import { generateCommand } from "./commands/generate.js";
import { configCommand } from "./commands/config.js";
import { statusCommand } from "./commands/status.js";
import { cleanCommand } from "./commands/clean.js";

const program = new Command()
  .name("forgeline")
  .description("Forgeline: plan, write, review and test a project from a description")
  .version("0.1.0");

program.addCommand(generateCommand());
program.addCommand(statusCommand());
program.addCommand(configCommand());
program.addCommand(cleanCommand());

await program.parseAsync();
