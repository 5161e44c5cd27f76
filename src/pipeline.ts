/**
 * Probe Pipeline
 * key -> features (SMS gate) -> build -> test -> aggregate -> report,
 * each stage finishing before the next starts
 */

import chalk from "chalk";
import { manifestPath, type HarnessConfig } from "./config.js";
import { ReportError } from "./errors.js";
import { selectFeatures, type FeatureFlags, type FeatureSelection } from "./features.js";
import { runBuildPhase, runTestPhase } from "./phases.js";
import type { ProcessRunner } from "./process.js";
import type { PhaseProgress } from "./progress.js";
import { readAuthKey, type LineSource } from "./prompt.js";
import { sendResult, type ResultSender } from "./report.js";
import { aggregateResult, type PhaseOutcome, type TestResult } from "./result.js";

export interface PipelineDeps {
  /** Operator input; closed once the interactive stages are over */
  prompts: LineSource & { close(): void };
  progress: PhaseProgress;
  runner?: ProcessRunner;
  send?: ResultSender;
  /** Stream child output live */
  verbose?: boolean;
}

export type PipelineOutcome =
  | { status: "declined" }
  | { status: "reported"; result: TestResult };

async function trackPhase(
  progress: PhaseProgress,
  label: string,
  run: () => Promise<PhaseOutcome>
): Promise<PhaseOutcome> {
  let outcome: PhaseOutcome;
  try {
    outcome = await run();
  } catch (error: unknown) {
    progress.fail(`${label} could not start`);
    throw error;
  }

  // An exit failure is data: report it and keep going
  if (outcome.succeeded) {
    progress.succeed(`${label} passed`);
  } else {
    progress.fail(`${label} failed`);
  }
  return outcome;
}

export async function runPipeline(
  config: HarnessConfig,
  flags: FeatureFlags,
  deps: PipelineDeps
): Promise<PipelineOutcome> {
  const { prompts, progress } = deps;
  const send = deps.send ?? sendResult;
  const phaseOptions = { runner: deps.runner, echo: deps.verbose };

  let key: string;
  let selection: FeatureSelection | null;
  try {
    key = await readAuthKey(prompts, config.keyLength);
    selection = await selectFeatures(flags, prompts);
  } finally {
    prompts.close();
  }

  if (!selection) {
    console.log(chalk.yellow("Aborting test."));
    return { status: "declined" };
  }

  const features = selection.featureString || "(none)";
  console.log(chalk.dim(`\nTarget: ${manifestPath(config)} | features: ${features}\n`));

  progress.startPhase("build", config.repoPath);
  const build = await trackPhase(progress, "Build", () => runBuildPhase(config, phaseOptions));

  const testSelection = selection;
  progress.startPhase("test", features);
  const test = await trackPhase(progress, "Test", () => runTestPhase(config, testSelection, phaseOptions));

  const result = aggregateResult(build, test, testSelection);

  progress.startPhase("report", config.endpoint);
  try {
    await send(config.endpoint, key, result);
  } catch (error: unknown) {
    progress.fail("Report not delivered");
    throw new ReportError("error sending result", error);
  }
  progress.succeed("Result reported");

  return { status: "reported", result };
}
