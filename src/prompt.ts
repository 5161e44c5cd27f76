/**
 * Operator Prompts
 * Line-oriented questions over injectable streams: the authentication key
 * and yes/no confirmations
 */

import * as readline from "readline";
import type { Readable, Writable } from "stream";
import { IoError } from "./errors.js";

export const KEY_PROMPT = "Please, insert your authentication key:\n";
export const INVALID_KEY_PROMPT = "Invalid key, please, insert the correct key:\n";
export const YES_NO_RETRY_PROMPT = "Please, select 'y' (yes) or 'n' (no)";

/**
 * Anything that can print a prompt and hand back the next input line
 */
export interface LineSource {
  ask(prompt: string): Promise<string>;
}

/**
 * Reads operator answers one line at a time
 */
export class PromptSession implements LineSource {
  private rl: readline.Interface;
  private lines: AsyncIterator<string>;
  private output: Writable;
  private closed = false;
  private outputError: Error | null = null;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
    this.output = output;
    this.output.on("error", (error: Error) => {
      this.outputError = error;
    });
  }

  private write(text: string): Promise<void> {
    if (this.outputError) {
      return Promise.reject(new IoError("could not write to the output stream", this.outputError));
    }
    return new Promise((resolve, reject) => {
      this.output.write(text, (error) => {
        if (error) {
          reject(new IoError("could not write to the output stream", error));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Print `prompt` as-is and wait for the next line (without its line ending)
   */
  async ask(prompt: string): Promise<string> {
    await this.write(prompt);

    if (this.closed) {
      throw new IoError("input stream closed before a line was read");
    }

    let next: IteratorResult<string>;
    try {
      next = await this.lines.next();
    } catch (error: unknown) {
      throw new IoError("could not read from the input stream", error);
    }

    if (next.done) {
      throw new IoError("input stream closed before a line was read");
    }
    return next.value;
  }

  /**
   * Release the input stream so the process can exit
   */
  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.rl.close();
    }
  }
}

/**
 * Ask for the operator key until its trimmed length is exactly `keyLength`.
 * There is no retry limit.
 */
export async function readAuthKey(source: LineSource, keyLength: number): Promise<string> {
  let key = (await source.ask(KEY_PROMPT)).trim();
  while (key.length !== keyLength) {
    key = (await source.ask(INVALID_KEY_PROMPT)).trim();
  }
  return key;
}

/**
 * Yes/no question. Loops on anything but exactly "y" or "n" after trimming.
 */
export async function confirm(
  source: LineSource,
  question: string,
  retry: string = YES_NO_RETRY_PROMPT
): Promise<boolean> {
  let answer = (await source.ask(question)).trim();
  while (answer !== "y" && answer !== "n") {
    answer = (await source.ask(retry)).trim();
  }
  return answer === "y";
}
