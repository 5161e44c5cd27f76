/**
 * Process Runner
 * Runs an external command to completion and captures everything it printed
 */

import { spawn } from "child_process";
import { SpawnError } from "./errors.js";

export interface ProcessOutput {
  /** Exited normally with status 0 */
  success: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  /** Mirror child output to this process's stdout/stderr while capturing */
  echo?: boolean;
}

export type ProcessRunner = (
  command: string,
  args: string[],
  options?: RunProcessOptions
) => Promise<ProcessOutput>;

/**
 * Decode captured bytes; invalid UTF-8 becomes U+FFFD instead of failing
 */
export function decodeOutput(chunks: Buffer[]): string {
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Spawn `command` and wait for it to exit. A non-zero exit resolves with
 * `success: false`; only a failure to launch rejects (with a SpawnError).
 */
export const runProcess: ProcessRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let settled = false;

    const proc = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    proc.stdout.on("data", (chunk: Buffer) => {
      stdoutChunks.push(chunk);
      if (options.echo) process.stdout.write(chunk);
    });

    proc.stderr.on("data", (chunk: Buffer) => {
      stderrChunks.push(chunk);
      if (options.echo) process.stderr.write(chunk);
    });

    proc.on("error", (error) => {
      if (settled) return;
      settled = true;
      reject(new SpawnError(`failed to launch '${command}'`, error));
    });

    proc.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      resolve({
        success: code === 0,
        exitCode: code,
        signal,
        stdout: decodeOutput(stdoutChunks),
        stderr: decodeOutput(stderrChunks),
      });
    });
  });
};
