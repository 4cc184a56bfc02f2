/**
 * JSON GET helper shared by the feed fetchers.
 * Every failure surfaces as a FetchError for the retry driver.
 */

import { FetchError, errorMessage } from "@departure-board/core";

const REQUEST_TIMEOUT_MS = 10_000;

export async function getJson(
  source: string,
  url: URL,
  timeoutMs: number = REQUEST_TIMEOUT_MS
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new FetchError(source, `Request failed: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw new FetchError(source, `HTTP ${response.status} ${response.statusText}`);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new FetchError(source, `Invalid JSON: ${errorMessage(error)}`, { cause: error });
  }
}
