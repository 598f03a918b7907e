import { computeExponentialBackoffMs } from "../backoff";
import type { RelayLogger } from "../logger";
import type { RemoteEventSource, RemoteEventStream } from "../relay/contracts";
import type { RelayConfig } from "../types";
import {
  createErrorMessage,
  fetchWithTimeout,
  isRetriableStatus,
  normalizeBaseUrl,
  parseRetryAfterMs,
  shouldRetryFetchError,
  sleepFor,
  type FetchLike,
  type SleepLike
} from "./http";
import {
  parseApiVersion,
  parseCollectorId,
  parseCurrentTime,
  parseEventBatch
} from "./responseParser";

const TARGET = "History API";

export type HistoryClientConfig = Pick<
  RelayConfig,
  | "sourceBaseUrl"
  | "sourceApiKey"
  | "sourceTimeoutMs"
  | "sourceMaxRetries"
  | "sourceRetryBaseMs"
  | "sourceRetryMaxMs"
>;

export interface HistoryClientDependencies {
  fetchImpl?: FetchLike;
  sleep?: SleepLike;
  now?: () => number;
  random?: () => number;
  logger?: RelayLogger;
}

export interface HistoryClient extends RemoteEventSource {
  apiVersion: (signal?: AbortSignal) => Promise<string>;
}

interface RequestOptions {
  method: "GET" | "POST" | "DELETE";
  body?: unknown;
  retryable: boolean;
  signal?: AbortSignal;
}

export function buildHistoryUrl(
  sourceBaseUrl: string,
  pathname: string,
  params: Record<string, string> = {}
): URL {
  const url = new URL(pathname, normalizeBaseUrl(sourceBaseUrl));

  for (const [name, value] of Object.entries(params)) {
    url.searchParams.set(name, value);
  }

  return url;
}

/**
 * Remote event source over the JSON history API. Only the time and about
 * calls are retried, and their retry waits stop when `signal` aborts.
 * Opening, reading and closing a collector fail on the first error.
 */
export function createHistoryClient(
  config: HistoryClientConfig,
  dependencies: HistoryClientDependencies = {}
): HistoryClient {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const sleep = dependencies.sleep ?? sleepFor;
  const now = dependencies.now ?? Date.now;
  const random = dependencies.random ?? Math.random;
  const logger = dependencies.logger;
  const maxAttempts = Math.max(1, config.sourceMaxRetries + 1);

  const request = async (url: URL, options: RequestOptions): Promise<Response> => {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "X-API-Key": config.sourceApiKey
    };
    const requestInit: RequestInit = { method: options.method, headers };

    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      requestInit.body = JSON.stringify(options.body);
    }

    let attempt = 1;

    while (true) {
      let response: Response;

      try {
        response = await fetchWithTimeout(
          fetchImpl,
          TARGET,
          url,
          requestInit,
          config.sourceTimeoutMs,
          options.signal
        );
      } catch (error) {
        const shouldRetry =
          options.retryable &&
          !options.signal?.aborted &&
          shouldRetryFetchError(error) &&
          attempt < maxAttempts;
        if (!shouldRetry) {
          throw error;
        }

        const retryDelayMs = computeExponentialBackoffMs(
          attempt,
          config.sourceRetryBaseMs,
          config.sourceRetryMaxMs,
          random
        );
        logger?.debug({ attempt, retryDelayMs, url: url.pathname }, "retrying history request");
        attempt += 1;
        await sleep(retryDelayMs, options.signal);
        continue;
      }

      if (response.ok) {
        return response;
      }

      const body = await response.text();
      const shouldRetryStatus =
        options.retryable &&
        !options.signal?.aborted &&
        isRetriableStatus(response.status) &&
        attempt < maxAttempts;

      if (!shouldRetryStatus) {
        throw new Error(createErrorMessage(TARGET, response.status, body));
      }

      const retryAfterMs =
        response.status === 429
          ? parseRetryAfterMs(response.headers.get("Retry-After"), now())
          : null;
      const retryDelayMs =
        retryAfterMs ??
        computeExponentialBackoffMs(
          attempt,
          config.sourceRetryBaseMs,
          config.sourceRetryMaxMs,
          random
        );

      logger?.debug(
        { attempt, retryDelayMs, status: response.status, url: url.pathname },
        "retrying history request"
      );
      attempt += 1;
      await sleep(retryDelayMs, options.signal);
    }
  };

  const requestJson = async (url: URL, options: RequestOptions): Promise<unknown> => {
    const response = await request(url, options);
    const payload: unknown = await response.json();
    return payload;
  };

  const openStream = (collectorId: string): RemoteEventStream => {
    const collectorPath = `collectors/${encodeURIComponent(collectorId)}`;

    return {
      async readNext(maxBatch: number, signal?: AbortSignal) {
        const url = buildHistoryUrl(config.sourceBaseUrl, `${collectorPath}/events`, {
          max: String(Math.max(1, maxBatch))
        });

        return parseEventBatch(
          await requestJson(url, { method: "GET", retryable: false, signal })
        );
      },
      async close() {
        // One attempt only; runs after the relay stopped.
        await request(buildHistoryUrl(config.sourceBaseUrl, collectorPath), {
          method: "DELETE",
          retryable: false
        });
      }
    };
  };

  return {
    async currentTime(signal?: AbortSignal) {
      const url = buildHistoryUrl(config.sourceBaseUrl, "time");
      return parseCurrentTime(
        await requestJson(url, { method: "GET", retryable: true, signal })
      );
    },
    async apiVersion(signal?: AbortSignal) {
      const url = buildHistoryUrl(config.sourceBaseUrl, "about");
      return parseApiVersion(
        await requestJson(url, { method: "GET", retryable: true, signal })
      );
    },
    async open(beginTime: Date, signal?: AbortSignal) {
      const url = buildHistoryUrl(config.sourceBaseUrl, "collectors");
      const collectorId = parseCollectorId(
        await requestJson(url, {
          method: "POST",
          body: { beginTime: beginTime.toISOString() },
          retryable: false,
          signal
        })
      );

      logger?.debug({ collectorId, beginTime: beginTime.toISOString() }, "opened event collector");
      return openStream(collectorId);
    }
  };
}
