/**
 * Test Result
 * The single record built from both phases and sent to the endpoint
 */

import type { Feature, FeatureSelection } from "./features.js";

export interface PhaseOutcome {
  succeeded: boolean;
  stdout: string;
  stderr: string;
}

export interface TestResult {
  readonly build: Readonly<PhaseOutcome>;
  readonly test: Readonly<PhaseOutcome>;
  readonly features: readonly Feature[];
}

/**
 * JSON body accepted by the report endpoint
 */
export interface ReportPayload {
  build: boolean;
  build_stdout: string;
  build_stderr: string;
  test: boolean;
  test_stdout: string;
  test_stderr: string;
  features: Feature[];
}

/**
 * Assemble the final record. `selection` must be the one the test phase ran with.
 */
export function aggregateResult(
  build: PhaseOutcome,
  test: PhaseOutcome,
  selection: FeatureSelection
): TestResult {
  return Object.freeze({
    build: Object.freeze({ ...build }),
    test: Object.freeze({ ...test }),
    features: Object.freeze([...selection.features]),
  });
}

export function toPayload(result: TestResult): ReportPayload {
  return {
    build: result.build.succeeded,
    build_stdout: result.build.stdout,
    build_stderr: result.build.stderr,
    test: result.test.succeeded,
    test_stdout: result.test.stdout,
    test_stderr: result.test.stderr,
    features: [...result.features],
  };
}
