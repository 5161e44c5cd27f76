/**
 * Tests for the build and test phases
 */

import { describe, it, expect, vi } from "vitest";
import { DEFAULT_CONFIG } from "../src/config.js";
import { SpawnError } from "../src/errors.js";
import { buildArgs, runBuildPhase, runTestPhase, testArgs } from "../src/phases.js";
import type { ProcessOutput, ProcessRunner } from "../src/process.js";

const MANIFEST = "/opt/openstratos/server-rs/Cargo.toml";

function exited(success: boolean, stdout = "", stderr = ""): ProcessOutput {
  return { success, exitCode: success ? 0 : 101, signal: null, stdout, stderr };
}

describe("buildArgs", () => {
  it("points the build at the manifest", () => {
    expect(buildArgs(MANIFEST)).toEqual(["build", "--manifest-path", MANIFEST]);
  });
});

describe("testArgs", () => {
  it("passes the feature string and selects ignored tests", () => {
    expect(testArgs(MANIFEST, "fona gps")).toEqual([
      "test",
      "--manifest-path",
      MANIFEST,
      "--no-default-features",
      "--features",
      "fona gps",
      "--",
      "--ignored",
    ]);
  });

  it("omits --features when nothing is selected", () => {
    expect(testArgs(MANIFEST, "")).toEqual([
      "test",
      "--manifest-path",
      MANIFEST,
      "--no-default-features",
      "--",
      "--ignored",
    ]);
  });
});

describe("runBuildPhase", () => {
  it("runs the build tool and records the outcome", async () => {
    const runner = vi.fn<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>()
      .mockResolvedValue(exited(true, "Compiling", "Finished"));

    const outcome = await runBuildPhase(DEFAULT_CONFIG, { runner, echo: false });

    expect(runner).toHaveBeenCalledWith("cargo", ["build", "--manifest-path", MANIFEST], { echo: false });
    expect(outcome).toEqual({ succeeded: true, stdout: "Compiling", stderr: "Finished" });
  });

  it("returns a failed outcome instead of throwing", async () => {
    const runner = vi.fn<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>()
      .mockResolvedValue(exited(false, "", "could not compile"));

    const outcome = await runBuildPhase(DEFAULT_CONFIG, { runner });
    expect(outcome).toEqual({ succeeded: false, stdout: "", stderr: "could not compile" });
  });

  it("uses the configured build tool and manifest", async () => {
    const runner = vi.fn<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>()
      .mockResolvedValue(exited(true));
    const config = { ...DEFAULT_CONFIG, buildTool: "cross", repoPath: "/srv/probe" };

    await runBuildPhase(config, { runner, echo: true });
    expect(runner).toHaveBeenCalledWith("cross", ["build", "--manifest-path", "/srv/probe/Cargo.toml"], { echo: true });
  });

  it("wraps a launch failure in a spawn error", async () => {
    const cause = new SpawnError("failed to launch 'cargo'");
    const runner = vi.fn<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>()
      .mockRejectedValue(cause);

    const run = runBuildPhase(DEFAULT_CONFIG, { runner });
    await expect(run).rejects.toThrow("error running the build command");
    await expect(run).rejects.toMatchObject({ kind: "spawn", cause });
  });
});

describe("runTestPhase", () => {
  it("runs the ignored tests with the selected features", async () => {
    const runner = vi.fn<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>()
      .mockResolvedValue(exited(true, "test result: ok. 4 passed"));

    const outcome = await runTestPhase(
      DEFAULT_CONFIG,
      { features: ["fona", "gps"], featureString: "fona gps" },
      { runner, echo: false }
    );

    expect(runner).toHaveBeenCalledWith("cargo", testArgs(MANIFEST, "fona gps"), { echo: false });
    expect(outcome).toEqual({ succeeded: true, stdout: "test result: ok. 4 passed", stderr: "" });
  });

  it("names the test command when it cannot start", async () => {
    const runner = vi.fn<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>()
      .mockRejectedValue(new Error("EACCES"));

    await expect(
      runTestPhase(DEFAULT_CONFIG, { features: [], featureString: "" }, { runner })
    ).rejects.toThrow("error running the test command");
  });
});
