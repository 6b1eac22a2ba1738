#!/usr/bin/env node

import { Command } from "commander";
import { registerHistoryCommand } from "./commands/history";
import { registerWatchCommand } from "./commands/watch";

const program = new Command();

program
  .name("collab-scout")
  .description("Queue top tracks from new artists on your liked collaborations")
  .version("1.0.0");

registerWatchCommand(program);
registerHistoryCommand(program);

program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
