import type { Checkpoint, OutboundEnvelope, RemoteEvent } from "../types";

export interface RemoteEventStream {
  /**
   * Returns up to `maxBatch` events after the stream position, in key order.
   * An empty array means no new events yet.
   */
  readNext: (maxBatch: number, signal?: AbortSignal) => Promise<RemoteEvent[]>;
  close: () => Promise<void>;
}

export interface RemoteEventSource {
  currentTime: (signal?: AbortSignal) => Promise<Date>;
  open: (beginTime: Date, signal?: AbortSignal) => Promise<RemoteEventStream>;
}

export type SendResult = { ack: true } | { ack: false; error: Error };

export interface EnvelopeSink {
  send: (envelope: OutboundEnvelope, signal?: AbortSignal) => Promise<SendResult>;
}

export interface CheckpointStore {
  get: (key: string) => Promise<Checkpoint | null>;
  /** In-memory only; nothing is durable until {@link CheckpointStore.flush}. */
  stage: (key: string, checkpoint: Checkpoint) => Promise<void>;
  flush: () => Promise<void>;
}
