import { XMLBuilder } from "fast-xml-parser";

import { ConversionError } from "../errors";
import type { OutboundEnvelope, PayloadEncoding, RemoteEvent } from "../types";

const EVENT_TYPE_PREFIX = "dev.historyrelay.event.";
const EVENT_TYPE_SUFFIX = ".v0";

export interface ConvertOptions {
  sourceIdentity: string;
  apiVersion: string;
  encoding: PayloadEncoding;
}

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: true,
  suppressEmptyNode: true
});

export function formatEventType(eventType: string): string {
  return `${EVENT_TYPE_PREFIX}${eventType}${EVENT_TYPE_SUFFIX}`;
}

function encodeJson(event: RemoteEvent): string {
  const encoded: unknown = JSON.stringify(event.payload);

  if (typeof encoded !== "string") {
    throw new ConversionError(event.key, "payload is not JSON-serializable");
  }

  return encoded;
}

function encodeXml(event: RemoteEvent): string {
  const encoded: unknown = xmlBuilder.build({ event: event.payload });

  if (typeof encoded !== "string") {
    throw new ConversionError(event.key, "payload is not XML-serializable");
  }

  return encoded;
}

export function encodePayload(
  event: RemoteEvent,
  encoding: PayloadEncoding
): string {
  try {
    switch (encoding) {
      case "application/json":
        return encodeJson(event);
      case "application/xml":
        return encodeXml(event);
      default: {
        const unsupported: never = encoding;
        throw new ConversionError(
          event.key,
          `unsupported payload encoding ${String(unsupported)}`
        );
      }
    }
  } catch (error) {
    if (error instanceof ConversionError) {
      throw error;
    }

    throw new ConversionError(event.key, `encode payload as ${encoding}`, error);
  }
}

export function convertEvent(
  event: RemoteEvent,
  options: ConvertOptions
): OutboundEnvelope {
  return {
    specversion: "1.0",
    id: String(event.key),
    source: options.sourceIdentity,
    type: formatEventType(event.type),
    time: event.createdTime,
    datacontenttype: options.encoding,
    eventclass: event.eventClass,
    sourceapiversion: options.apiVersion,
    data: encodePayload(event, options.encoding)
  };
}
