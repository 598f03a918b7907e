import { setTimeout as delay } from "node:timers/promises";

export type FetchLike = typeof fetch;
export type SleepLike = (ms: number, signal?: AbortSignal) => Promise<void>;

export class RequestTimeoutError extends Error {
  constructor(target: string, timeoutMs: number) {
    super(`${target} request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export function parseRetryAfterMs(
  retryAfterHeader: string | null,
  nowMs: number
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const trimmed = retryAfterHeader.trim();

  if (trimmed.length === 0) {
    return null;
  }

  if (/^\d+$/.test(trimmed)) {
    const seconds = Number.parseInt(trimmed, 10);
    return Math.max(0, seconds * 1000);
  }

  const retryDateMs = Date.parse(trimmed);
  if (Number.isNaN(retryDateMs)) {
    return null;
  }

  return Math.max(0, retryDateMs - nowMs);
}

export function isRetriableStatus(statusCode: number): boolean {
  return statusCode === 429 || statusCode >= 500;
}

export function shouldRetryFetchError(error: unknown): boolean {
  if (error instanceof RequestTimeoutError) {
    return true;
  }

  if (error instanceof Error) {
    return error.name === "TypeError";
  }

  return false;
}

// Rejects with an AbortError as soon as `signal` aborts.
export async function sleepFor(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
}

export function createErrorMessage(
  target: string,
  status: number,
  body: string
): string {
  if (!body) {
    return `${target} request failed with status ${status}`;
  }

  return `${target} request failed with status ${status}: ${body}`;
}

/**
 * Runs one request with a timeout. An abort from `signal` is rethrown as-is;
 * only the internal timer turns into a {@link RequestTimeoutError}.
 */
export async function fetchWithTimeout(
  fetchImpl: FetchLike,
  target: string,
  requestUrl: URL,
  requestInit: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeoutMs);
  const onCallerAbort = (): void => {
    controller.abort();
  };
  if (signal?.aborted) {
    controller.abort();
  }
  signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    return await fetchImpl(requestUrl, {
      ...requestInit,
      signal: controller.signal
    });
  } catch (error) {
    if (controller.signal.aborted && !signal?.aborted) {
      throw new RequestTimeoutError(target, timeoutMs);
    }

    throw error;
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", onCallerAbort);
  }
}
