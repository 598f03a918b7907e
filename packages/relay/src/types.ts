export type PayloadEncoding = "application/json" | "application/xml";

export const PAYLOAD_ENCODINGS: readonly PayloadEncoding[] = [
  "application/json",
  "application/xml"
];

export interface RemoteEvent {
  key: number;
  createdTime: Date;
  type: string;
  eventClass: string;
  payload: unknown;
}

export interface EnvelopeExtensions {
  eventclass: string;
  sourceapiversion: string;
}

export interface OutboundEnvelope extends EnvelopeExtensions {
  specversion: "1.0";
  id: string;
  source: string;
  type: string;
  time: Date;
  datacontenttype: PayloadEncoding;
  data: string;
}

export interface Checkpoint {
  sourceIdentity: string;
  lastEventKey: number;
  lastEventType: string;
  lastEventTimestamp: Date;
  writtenAt: Date;
}

export interface CheckpointConfig {
  maxReplayAgeMs: number;
  flushPeriodMs: number;
}

export interface RelayConfig {
  databaseUrl: string;
  migrationsDir: string | null;
  checkpointKey: string;
  checkpoint: CheckpointConfig;
  payloadEncoding: PayloadEncoding;
  sourceBaseUrl: string;
  sourceApiKey: string;
  sourceTimeoutMs: number;
  sourceMaxRetries: number;
  sourceRetryBaseMs: number;
  sourceRetryMaxMs: number;
  sinkUrl: string;
  sinkTimeoutMs: number;
  progressLogIntervalMs: number;
  logLevel: string;
}
