export interface MockEvent {
  key: number;
  createdTime: string;
  type: string;
  class: string;
  payload: {
    message: string;
    entity: string;
    userName: string;
  };
}

export interface MockHistoryOptions {
  startMs: number;
  intervalMs: number;
}

export interface MockCollector {
  id: string;
  nextIndex: number;
}

const EVENT_KINDS: ReadonlyArray<{ type: string; class: string; message: string }> = [
  { type: "VmPoweredOnEvent", class: "event", message: "powered on" },
  { type: "VmPoweredOffEvent", class: "event", message: "powered off" },
  { type: "UserLoginSessionEvent", class: "event", message: "logged in" },
  { type: "AlarmStatusChangedEvent", class: "eventex", message: "alarm status changed" }
];

// Event `index` has key `index + 1` and is created `index * intervalMs` after start.
export function buildMockEvent(index: number, options: MockHistoryOptions): MockEvent {
  const kind = EVENT_KINDS[index % EVENT_KINDS.length];
  const entity = `vm-${(index % 16).toString().padStart(2, "0")}`;

  return {
    key: index + 1,
    createdTime: new Date(options.startMs + index * options.intervalMs).toISOString(),
    type: kind.type,
    class: kind.class,
    payload: {
      message: `${entity} ${kind.message}`,
      entity,
      userName: "mock-operator"
    }
  };
}

export function countVisibleEvents(nowMs: number, options: MockHistoryOptions): number {
  if (nowMs < options.startMs) {
    return 0;
  }

  return Math.floor((nowMs - options.startMs) / Math.max(1, options.intervalMs)) + 1;
}

export function firstIndexAtOrAfter(beginMs: number, options: MockHistoryOptions): number {
  if (beginMs <= options.startMs) {
    return 0;
  }

  return Math.ceil((beginMs - options.startMs) / Math.max(1, options.intervalMs));
}

export function openCollector(
  id: string,
  beginMs: number,
  options: MockHistoryOptions
): MockCollector {
  return { id, nextIndex: firstIndexAtOrAfter(beginMs, options) };
}

export function readCollector(
  collector: MockCollector,
  max: number,
  nowMs: number,
  options: MockHistoryOptions
): MockEvent[] {
  const endIndex = Math.min(
    collector.nextIndex + Math.max(1, max),
    countVisibleEvents(nowMs, options)
  );
  const events: MockEvent[] = [];

  for (let index = collector.nextIndex; index < endIndex; index += 1) {
    events.push(buildMockEvent(index, options));
  }

  collector.nextIndex = Math.max(collector.nextIndex, endIndex);
  return events;
}
