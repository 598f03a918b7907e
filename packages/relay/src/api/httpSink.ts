import type { RelayLogger } from "../logger";
import type { EnvelopeSink, SendResult } from "../relay/contracts";
import type { OutboundEnvelope, RelayConfig } from "../types";
import { createErrorMessage, fetchWithTimeout, type FetchLike } from "./http";

const TARGET = "Sink";

export type HttpSinkConfig = Pick<RelayConfig, "sinkUrl" | "sinkTimeoutMs">;

export interface HttpSinkDependencies {
  fetchImpl?: FetchLike;
  logger?: RelayLogger;
}

// CloudEvents HTTP binary content mode: attributes as ce-* headers, data as body.
export function buildBinaryHeaders(envelope: OutboundEnvelope): Record<string, string> {
  return {
    "Content-Type": envelope.datacontenttype,
    "ce-specversion": envelope.specversion,
    "ce-id": envelope.id,
    "ce-source": envelope.source,
    "ce-type": envelope.type,
    "ce-time": envelope.time.toISOString(),
    "ce-eventclass": envelope.eventclass,
    "ce-sourceapiversion": envelope.sourceapiversion
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function createHttpSink(
  config: HttpSinkConfig,
  dependencies: HttpSinkDependencies = {}
): EnvelopeSink {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const sinkUrl = new URL(config.sinkUrl);

  return {
    async send(envelope: OutboundEnvelope, signal?: AbortSignal): Promise<SendResult> {
      let response: Response;

      try {
        response = await fetchWithTimeout(
          fetchImpl,
          TARGET,
          sinkUrl,
          {
            method: "POST",
            headers: buildBinaryHeaders(envelope),
            body: envelope.data
          },
          config.sinkTimeoutMs,
          signal
        );
      } catch (error) {
        return { ack: false, error: toError(error) };
      }

      if (response.ok) {
        await response.body?.cancel();
        return { ack: true };
      }

      const body = await response.text();
      dependencies.logger?.error(
        { id: envelope.id, status: response.status },
        "failed to send cloudevent"
      );
      return {
        ack: false,
        error: new Error(createErrorMessage(TARGET, response.status, body))
      };
    }
  };
}
