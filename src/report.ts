/**
 * Report Client
 * Delivers the finished result to the remote endpoint, authenticated with the operator key
 */

import { ResponseError, TransportError } from "./errors.js";
import { toPayload, type TestResult } from "./result.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type ResultSender = (endpoint: string, key: string, result: TestResult) => Promise<void>;

/**
 * HTTP Basic credentials: the key as username, no password
 */
export function basicAuthHeader(key: string): string {
  return `Basic ${Buffer.from(`${key}:`).toString("base64")}`;
}

/**
 * POST the result as JSON. Anything but 200 fails with the status and the
 * response body verbatim; no retries.
 */
export async function sendResult(
  endpoint: string,
  key: string,
  result: TestResult,
  fetchImpl: FetchLike = fetch
): Promise<void> {
  let response: Response;
  try {
    response = await fetchImpl(endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "Authorization": basicAuthHeader(key),
      },
      body: JSON.stringify(toPayload(result)),
    });
  } catch (error: unknown) {
    throw new TransportError("could not reach the report endpoint", error);
  }

  if (response.status !== 200) {
    let body: string;
    try {
      body = await response.text();
    } catch (error: unknown) {
      throw new TransportError("error reading the response body", error);
    }
    throw new ResponseError(response.status, body);
  }
}
