import type { RemoteEvent } from "../types";

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toTimestamp(value: unknown, field: string): Date {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new Error(`Invalid history response: ${field} must be an ISO-8601 string`);
  }

  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid history response: ${field} is not a timestamp: ${value}`);
  }

  return new Date(parsed);
}

function toEventKey(value: unknown): number {
  if (typeof value === "string" && value.trim().length === 0) {
    throw new Error("Invalid event payload: key must be an integer");
  }

  const candidate = typeof value === "string" ? Number(value) : value;

  if (typeof candidate !== "number" || !Number.isSafeInteger(candidate)) {
    throw new Error("Invalid event payload: key must be an integer");
  }

  return candidate;
}

function toNonEmptyString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`Invalid event payload: missing ${field}`);
  }

  return value;
}

export function parseRemoteEvent(value: unknown): RemoteEvent {
  if (!isRecordLike(value)) {
    throw new Error("Invalid event payload: event must be an object");
  }

  return {
    key: toEventKey(value.key),
    createdTime: toTimestamp(value.createdTime, "createdTime"),
    type: toNonEmptyString(value.type, "type"),
    eventClass: toNonEmptyString(value.class ?? value.eventClass, "class"),
    payload: value.payload ?? null
  };
}

export function parseEventBatch(payload: unknown): RemoteEvent[] {
  if (!isRecordLike(payload)) {
    throw new Error("Invalid history response: expected object");
  }

  const events = payload.events ?? payload.data;
  if (!Array.isArray(events)) {
    throw new Error("Invalid history response: events must be an array");
  }

  const parsed = events.map((item: unknown) => parseRemoteEvent(item));

  for (let index = 1; index < parsed.length; index += 1) {
    if (parsed[index].key <= parsed[index - 1].key) {
      throw new Error(
        `Invalid history response: event keys out of order (${parsed[index - 1].key} then ${parsed[index].key})`
      );
    }
  }

  return parsed;
}

export function parseCurrentTime(payload: unknown): Date {
  if (!isRecordLike(payload)) {
    throw new Error("Invalid history response: expected object");
  }

  return toTimestamp(payload.currentTime, "currentTime");
}

export function parseCollectorId(payload: unknown): string {
  if (!isRecordLike(payload)) {
    throw new Error("Invalid history response: expected object");
  }

  const collectorId = payload.collectorId;
  if (typeof collectorId !== "string" || collectorId.length === 0) {
    throw new Error("Invalid history response: collectorId must be a non-empty string");
  }

  return collectorId;
}

export function parseApiVersion(payload: unknown): string {
  if (!isRecordLike(payload)) {
    throw new Error("Invalid history response: expected object");
  }

  const apiVersion = payload.apiVersion;
  if (typeof apiVersion !== "string" || apiVersion.length === 0) {
    throw new Error("Invalid history response: apiVersion must be a non-empty string");
  }

  return apiVersion;
}
