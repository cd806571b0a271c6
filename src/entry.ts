#!/usr/bin/env node
import { Command } from "commander";
import { registerSlotcastCli } from "./cli/slotcast-cli.js";

const VERSION = "0.1.0";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("slotcast")
    .description("Fixed-cadence publication scheduler: one slot every 15 minutes")
    .version(VERSION);
  registerSlotcastCli(program);
  return program;
}

await buildProgram().parseAsync(process.argv);
