/**
 * Error Kinds
 * Every failure that aborts a probe run, tagged by kind and chained by cause
 */

export type HarnessErrorKind = "io" | "spawn" | "transport" | "response" | "report" | "config";

/**
 * Base class for all run-aborting errors
 */
export abstract class HarnessError extends Error {
  abstract readonly kind: HarnessErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/**
 * Operator input or console output failed
 */
export class IoError extends HarnessError {
  readonly kind = "io";
}

/**
 * An external command could not be launched (a non-zero exit is not this)
 */
export class SpawnError extends HarnessError {
  readonly kind = "spawn";
}

/**
 * The report never got an HTTP response
 */
export class TransportError extends HarnessError {
  readonly kind = "transport";
}

/**
 * The endpoint answered with something other than 200
 */
export class ResponseError extends HarnessError {
  readonly kind = "response";
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`A '${status}' status code was received, with this response body:\n${body}`);
    this.status = status;
    this.body = body;
  }
}

/**
 * The result could not be delivered; the transport or response failure is the cause
 */
export class ReportError extends HarnessError {
  readonly kind = "report";
}

/**
 * The configuration file is missing, unreadable or invalid
 */
export class ConfigError extends HarnessError {
  readonly kind = "config";
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render an error and its cause chain as printable lines.
 * The stack of the outermost error is appended when `withStack` is set.
 */
export function formatErrorChain(error: unknown, options: { withStack?: boolean } = {}): string[] {
  const lines = [`An error occurred: ${describe(error)}`];

  const seen = new Set<unknown>([error]);
  let current: unknown = error instanceof Error ? error.cause : undefined;
  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    lines.push(`\tcaused by: ${describe(current)}`);
    current = current instanceof Error ? current.cause : undefined;
  }

  if (options.withStack && error instanceof Error && error.stack) {
    lines.push("");
    lines.push(`\tbacktrace: ${error.stack}`);
  }

  return lines;
}
