/**
 * Build and Test Phases
 * Both run against the target repository's manifest. Exit failures are
 * recorded, not thrown.
 */

import { manifestPath, type HarnessConfig } from "./config.js";
import { SpawnError } from "./errors.js";
import type { FeatureSelection } from "./features.js";
import { runProcess, type ProcessRunner, type ProcessOutput } from "./process.js";
import type { PhaseOutcome } from "./result.js";

export interface PhaseOptions {
  runner?: ProcessRunner;
  echo?: boolean;
}

export function buildArgs(manifest: string): string[] {
  return ["build", "--manifest-path", manifest];
}

/**
 * Test invocation: default features off, selected features on (the flag is
 * omitted when none are), and only the ignored hardware tests
 */
export function testArgs(manifest: string, featureString: string): string[] {
  const args = ["test", "--manifest-path", manifest, "--no-default-features"];
  if (featureString) {
    args.push("--features", featureString);
  }
  args.push("--", "--ignored");
  return args;
}

function toOutcome(output: ProcessOutput): PhaseOutcome {
  return {
    succeeded: output.success,
    stdout: output.stdout,
    stderr: output.stderr,
  };
}

async function runPhase(
  config: HarnessConfig,
  args: string[],
  label: string,
  options: PhaseOptions
): Promise<PhaseOutcome> {
  const runner = options.runner ?? runProcess;
  let output: ProcessOutput;
  try {
    output = await runner(config.buildTool, args, { echo: options.echo });
  } catch (error: unknown) {
    throw new SpawnError(`error running the ${label} command`, error);
  }
  return toOutcome(output);
}

export async function runBuildPhase(config: HarnessConfig, options: PhaseOptions = {}): Promise<PhaseOutcome> {
  return runPhase(config, buildArgs(manifestPath(config)), "build", options);
}

export async function runTestPhase(
  config: HarnessConfig,
  selection: FeatureSelection,
  options: PhaseOptions = {}
): Promise<PhaseOutcome> {
  return runPhase(config, testArgs(manifestPath(config), selection.featureString), "test", options);
}
