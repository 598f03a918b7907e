import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type ServerResponse } from "node:http";

import { openCollector, readCollector, type MockCollector } from "./history";

const port = Number.parseInt(process.env.PORT ?? "3100", 10);
const intervalMs = Number.parseInt(process.env.MOCK_EVENT_INTERVAL_MS ?? "1000", 10);
const backfillMs = Number.parseInt(process.env.MOCK_BACKFILL_MS ?? "3600000", 10);
const apiVersion = process.env.MOCK_API_VERSION ?? "8.0.2.0";

const history = { startMs: Date.now() - backfillMs, intervalMs };
const collectors = new Map<string, MockCollector>();

function writeJson(
  response: ServerResponse,
  statusCode: number,
  payload: unknown
): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(payload));
}

async function readJsonBody(request: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];

  for await (const chunk of request) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  const text = Buffer.concat(chunks).toString("utf8");
  return text.length === 0 ? {} : JSON.parse(text);
}

function parseBeginMs(body: unknown): number {
  if (typeof body !== "object" || body === null || !("beginTime" in body)) {
    return Date.now();
  }

  const beginMs = typeof body.beginTime === "string" ? Date.parse(body.beginTime) : Number.NaN;
  if (Number.isNaN(beginMs)) {
    throw new Error("beginTime must be an ISO-8601 timestamp");
  }

  return beginMs;
}

async function handle(request: IncomingMessage, response: ServerResponse): Promise<void> {
  const url = new URL(request.url ?? "/", `http://localhost:${port}`);
  const segments = url.pathname.split("/").filter((segment) => segment.length > 0);

  if (url.pathname === "/health") {
    writeJson(response, 200, { status: "ok" });
    return;
  }

  if (segments[0] !== "api" || segments[1] !== "v1") {
    writeJson(response, 404, { error: "Not Found" });
    return;
  }

  const route = segments.slice(2);

  if (request.method === "GET" && route.length === 1 && route[0] === "time") {
    writeJson(response, 200, { currentTime: new Date().toISOString() });
    return;
  }

  if (request.method === "GET" && route.length === 1 && route[0] === "about") {
    writeJson(response, 200, { apiVersion });
    return;
  }

  if (request.method === "POST" && route.length === 1 && route[0] === "collectors") {
    try {
      const collector = openCollector(randomUUID(), parseBeginMs(await readJsonBody(request)), history);
      collectors.set(collector.id, collector);
      writeJson(response, 201, { collectorId: collector.id });
    } catch (error) {
      writeJson(response, 400, {
        error: "Invalid collector request",
        message: error instanceof Error ? error.message : String(error)
      });
    }
    return;
  }

  if (route[0] !== "collectors" || route.length < 2) {
    writeJson(response, 404, { error: "Not Found" });
    return;
  }

  const collector = collectors.get(route[1]);
  if (!collector) {
    writeJson(response, 404, { error: "Unknown collector" });
    return;
  }

  if (request.method === "DELETE" && route.length === 2) {
    collectors.delete(collector.id);
    response.statusCode = 204;
    response.end();
    return;
  }

  if (request.method === "GET" && route.length === 3 && route[2] === "events") {
    const max = Number.parseInt(url.searchParams.get("max") ?? "100", 10);
    const events = readCollector(collector, Number.isNaN(max) ? 100 : max, Date.now(), history);
    writeJson(response, 200, { events });
    return;
  }

  writeJson(response, 404, { error: "Not Found" });
}

const server = createServer((request, response) => {
  handle(request, response).catch((error: unknown) => {
    console.error("mock source request failed", error);
    writeJson(response, 500, { error: "Internal Server Error" });
  });
});

server.listen(port, "0.0.0.0", () => {
  console.log(
    `mock source listening on port ${port} (intervalMs=${intervalMs}, backfillMs=${backfillMs}, apiVersion=${apiVersion})`
  );
});
