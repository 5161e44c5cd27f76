#!/usr/bin/env node
/**
 * Probe CI
 *
 * Builds the target repository on the real test probe, runs its ignored
 * hardware tests with the chosen features and reports the outcome.
 *
 * Usage:
 *   probe-ci --fona --gps
 *   probe-ci --fona --no_sms --telemetry
 *   probe-ci --raspicam --config /etc/probe-ci.json --verbose
 */

import { Command } from "commander";
import chalk from "chalk";
import { realpathSync } from "fs";
import { resolve } from "path";
import { pathToFileURL } from "url";

import { loadConfig } from "./config.js";
import { formatErrorChain } from "./errors.js";
import type { FeatureFlags } from "./features.js";
import { runPipeline } from "./pipeline.js";
import { formatElapsed, ProgressTracker } from "./progress.js";
import { PromptSession } from "./prompt.js";
import type { TestResult } from "./result.js";
import pkg from "../package.json" with { type: "json" };

const VERSION = pkg.version;

interface CliOptions extends FeatureFlags {
  config?: string;
  verbose?: boolean;
}

function printSummary(result: TestResult, elapsedMs: number): void {
  const status = (ok: boolean) => (ok ? chalk.green("passed") : chalk.red("failed"));

  console.log();
  console.log(chalk.white(`  Build:    ${status(result.build.succeeded)}`));
  console.log(chalk.white(`  Test:     ${status(result.test.succeeded)}`));
  console.log(chalk.white(`  Features: ${chalk.cyan(result.features.join(", ") || "none")}`));
  console.log(chalk.white(`  Time:     ${chalk.cyan(formatElapsed(elapsedMs))}`));
}

async function run(opts: CliOptions): Promise<void> {
  const verbose = opts.verbose || false;
  const flags: FeatureFlags = {
    raspicam: opts.raspicam || false,
    fona: opts.fona || false,
    no_sms: opts.no_sms || false,
    gps: opts.gps || false,
    telemetry: opts.telemetry || false,
    no_power_off: opts.no_power_off || false,
  };

  if (flags.no_sms && !flags.fona) {
    console.error(chalk.red("--no_sms can only be used together with --fona"));
    process.exit(1);
  }

  const progress = new ProgressTracker(verbose);

  try {
    const config = await loadConfig(opts.config);
    const prompts = new PromptSession(process.stdin, process.stdout);
    const outcome = await runPipeline(config, flags, { prompts, progress, verbose });

    if (outcome.status === "reported") {
      printSummary(outcome.result, progress.getElapsedTime());
    }
  } catch (error: unknown) {
    progress.stop();
    for (const line of formatErrorChain(error, { withStack: verbose })) {
      console.log(chalk.red(line));
    }
    process.exit(1);
  }

  // Ensure process exits cleanly (fetch may keep the connection alive)
  process.exit(0);
}

// CLI setup
const program = new Command();

program
  .name("probe-ci")
  .description("Check the target repository on the real testing probe, with real hardware")
  .version(VERSION)
  .option("--raspicam", "Whether to test the Raspberry Pi camera")
  .option("--fona", "Whether to test the Adafruit FONA module")
  .option("--no_sms", "Do not send SMSs (requires --fona)")
  .option("--gps", "Whether to test the GPS module")
  .option("--telemetry", "Whether to test the telemetry module")
  .option("--no_power_off", "Do not power the Raspberry Pi off")
  .option("-c, --config <path>", "Configuration file overriding the built-in defaults")
  .option("-v, --verbose", "Stream build and test output, print stack traces on errors")
  .action(async (opts: CliOptions) => {
    await run(opts);
  });

const isCliEntry = Boolean(process.argv[1]) &&
  import.meta.url === pathToFileURL(realpathSync(resolve(process.argv[1]))).href;

if (isCliEntry) {
  await program.parseAsync();
}

export { program };
