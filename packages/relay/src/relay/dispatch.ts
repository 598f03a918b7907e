import { ConversionError, DeliveryError, RunCancelledError } from "../errors";
import type { RelayLogger } from "../logger";
import type { OutboundEnvelope, RemoteEvent } from "../types";
import type { EnvelopeSink, SendResult } from "./contracts";
import { convertEvent, type ConvertOptions } from "./eventConverter";

export interface DispatchContext {
  sink: EnvelopeSink;
  convert: ConvertOptions;
  logger: RelayLogger;
  signal?: AbortSignal;
}

export interface DispatchResult {
  successCount: number;
  error: ConversionError | DeliveryError | null;
}

/**
 * Converts and sends `events` in order, one at a time, stopping at the first
 * conversion failure or nack. Events after the failure point are not sent.
 */
export async function dispatchEvents(
  events: RemoteEvent[],
  context: DispatchContext
): Promise<DispatchResult> {
  let successCount = 0;

  for (const event of events) {
    if (context.signal?.aborted) {
      throw new RunCancelledError();
    }

    let envelope: OutboundEnvelope;
    try {
      envelope = convertEvent(event, context.convert);
    } catch (error) {
      if (error instanceof ConversionError) {
        return { successCount, error };
      }

      throw error;
    }

    context.logger.debug(
      { id: envelope.id, type: envelope.type },
      "sending event"
    );

    let result: SendResult;
    try {
      result = await context.sink.send(envelope, context.signal);
    } catch (error) {
      if (context.signal?.aborted) {
        throw new RunCancelledError();
      }

      return { successCount, error: new DeliveryError(event.key, error) };
    }

    if (!result.ack) {
      if (context.signal?.aborted) {
        throw new RunCancelledError();
      }

      return { successCount, error: new DeliveryError(event.key, result.error) };
    }

    successCount += 1;
  }

  return { successCount, error: null };
}
