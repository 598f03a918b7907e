import { Pool } from "pg";

// One relay run touches the store sequentially: a read at startup, then periodic flushes.
export function createPool(databaseUrl: string): Pool {
  return new Pool({
    connectionString: databaseUrl,
    application_name: "history-relay",
    max: 2,
    idleTimeoutMillis: 30_000
  });
}
