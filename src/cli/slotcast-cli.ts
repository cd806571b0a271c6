import type { Command } from "commander";
import {
  scheduleCatchUpCommand,
  scheduleDiscoverCommand,
  scheduleHealthCommand,
  scheduleRecoverCommand,
  scheduleRunCommand,
  scheduleStatusCommand,
} from "../commands/schedule.js";
import { defaultRuntime } from "../runtime.js";
import { runCommandWithRuntime } from "./cli-utils.js";

type CommonOpts = { config?: string; json?: boolean };

function commonOpts(opts: CommonOpts) {
  return { config: opts.config, json: Boolean(opts.json) };
}

export function registerSlotcastCli(program: Command) {
  program
    .command("run")
    .description("Sweep failed slots, then publish at most one due slot")
    .option("--config <path>", "YAML config file")
    .option("--json", "Output JSON", false)
    .action(async (opts: CommonOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        await scheduleRunCommand(commonOpts(opts), defaultRuntime);
      });
    });

  program
    .command("catch-up")
    .description("Publish several due slots under one lock")
    .option("--max <n>", "Maximum slots to attempt (default from config, capped at 96)")
    .option("--config <path>", "YAML config file")
    .option("--json", "Output JSON", false)
    .action(async (opts: CommonOpts & { max?: string }) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        await scheduleCatchUpCommand({ ...commonOpts(opts), max: opts.max }, defaultRuntime);
      });
    });

  program
    .command("recover")
    .description("Run the recovery sweep only")
    .option("--config <path>", "YAML config file")
    .option("--json", "Output JSON", false)
    .action(async (opts: CommonOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        await scheduleRecoverCommand(commonOpts(opts), defaultRuntime);
      });
    });

  program
    .command("discover")
    .description("Claim the inbox and allocate slots for new items")
    .option("--config <path>", "YAML config file")
    .option("--json", "Output JSON", false)
    .action(async (opts: CommonOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        await scheduleDiscoverCommand(commonOpts(opts), defaultRuntime);
      });
    });

  program
    .command("status")
    .description("Show queue counts, overdue and upcoming slots")
    .option("--config <path>", "YAML config file")
    .option("--json", "Output JSON", false)
    .action(async (opts: CommonOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        await scheduleStatusCommand(commonOpts(opts), defaultRuntime);
      });
    });

  program
    .command("health")
    .description("Show the 24h publish success rate (exit 1 when degraded)")
    .option("--config <path>", "YAML config file")
    .option("--json", "Output JSON", false)
    .action(async (opts: CommonOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        await scheduleHealthCommand(commonOpts(opts), defaultRuntime);
      });
    });
}
