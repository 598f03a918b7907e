import pino, { type Logger } from "pino";

export type RelayLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

export interface Loggers {
  root: Logger;
  relay: Logger;
  source: Logger;
  sink: Logger;
  db: Logger;
}

export function createLoggers(level: string): Loggers {
  const root = pino({ level });

  return {
    root,
    relay: root.child({ component: "relay" }),
    source: root.child({ component: "source" }),
    sink: root.child({ component: "sink" }),
    db: root.child({ component: "db" })
  };
}
