import { TransportError, type ExternalService } from "../errors.js";

import type { Logger } from "pino";

/**
 * The subset of `fetch` the API clients rely on; tests pass an in-process fake
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Send a request, logging timing at debug level.
 *
 * Network failures surface as TransportError; HTTP status handling is left to
 * the caller.
 */
export async function sendRequest(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit,
  context: { service: ExternalService; logger: Logger }
): Promise<Response> {
  const method = init.method ?? "GET";
  context.logger.debug({ method, url }, "Sending request");

  const startTime = performance.now();
  let response: Response;
  try {
    response = await fetchFn(url, init);
  } catch (error) {
    context.logger.error({ method, url, error }, "Request failed");
    throw new TransportError(
      `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
      context.service,
      undefined,
      { cause: error }
    );
  }
  const duration = Math.round(performance.now() - startTime);

  context.logger.debug(
    {
      method,
      url,
      status: response.status,
      statusText: response.statusText,
      duration: `${String(duration)}ms`,
    },
    "Received response"
  );

  return response;
}

/**
 * Read a response body as text without letting a broken stream mask the
 * original HTTP error
 */
export async function readErrorBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 500);
  } catch (error) {
    return `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
  }
}
