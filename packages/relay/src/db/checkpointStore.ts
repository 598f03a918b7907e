import type { QueryResult } from "pg";

import type { CheckpointStore } from "../relay/contracts";
import type { Checkpoint } from "../types";

interface CheckpointRow {
  checkpoint_key: string;
  source_identity: string;
  last_event_key: string;
  last_event_type: string;
  last_event_timestamp: Date;
  written_at: Date;
}

export interface Queryable {
  query: (text: string, values?: unknown[]) => Promise<QueryResult<CheckpointRow>>;
}

export interface CheckpointClient extends Queryable {
  release: () => void;
}

export interface CheckpointPool extends Queryable {
  connect: () => Promise<CheckpointClient>;
}

const SELECT_CHECKPOINT_SQL = `
SELECT checkpoint_key, source_identity, last_event_key, last_event_type, last_event_timestamp, written_at
FROM relay_checkpoints
WHERE checkpoint_key = $1;
`;

const UPSERT_CHECKPOINT_SQL = `
INSERT INTO relay_checkpoints (
  checkpoint_key, source_identity, last_event_key, last_event_type, last_event_timestamp, written_at, flushed_at
)
VALUES ($1, $2, $3, $4, $5, $6, NOW())
ON CONFLICT (checkpoint_key) DO UPDATE SET
  source_identity = EXCLUDED.source_identity,
  last_event_key = EXCLUDED.last_event_key,
  last_event_type = EXCLUDED.last_event_type,
  last_event_timestamp = EXCLUDED.last_event_timestamp,
  written_at = EXCLUDED.written_at,
  flushed_at = NOW();
`;

function rowToCheckpoint(row: CheckpointRow): Checkpoint {
  const lastEventKey = Number.parseInt(row.last_event_key, 10);

  if (Number.isNaN(lastEventKey)) {
    throw new Error(
      `relay_checkpoints row ${row.checkpoint_key} has invalid last_event_key: ${row.last_event_key}`
    );
  }

  return {
    sourceIdentity: row.source_identity,
    lastEventKey,
    lastEventType: row.last_event_type,
    lastEventTimestamp: row.last_event_timestamp,
    writtenAt: row.written_at
  };
}

export async function getCheckpoint(
  runner: Queryable,
  key: string
): Promise<Checkpoint | null> {
  const result = await runner.query(SELECT_CHECKPOINT_SQL, [key]);

  if (result.rows.length === 0) {
    return null;
  }

  return rowToCheckpoint(result.rows[0]);
}

export async function upsertCheckpoints(
  client: Queryable,
  checkpoints: ReadonlyMap<string, Checkpoint>
): Promise<void> {
  await client.query("BEGIN");

  try {
    for (const [key, checkpoint] of checkpoints) {
      await client.query(UPSERT_CHECKPOINT_SQL, [
        key,
        checkpoint.sourceIdentity,
        checkpoint.lastEventKey,
        checkpoint.lastEventType,
        checkpoint.lastEventTimestamp,
        checkpoint.writtenAt
      ]);
    }

    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}

/**
 * Checkpoint store on Postgres. `stage` only updates the in-memory copy;
 * `flush` writes every staged checkpoint in one transaction and keeps the
 * staged state, so a failed flush can be repeated.
 */
export function createPgCheckpointStore(pool: CheckpointPool): CheckpointStore {
  const staged = new Map<string, Checkpoint>();

  return {
    async get(key: string): Promise<Checkpoint | null> {
      return staged.get(key) ?? (await getCheckpoint(pool, key));
    },
    async stage(key: string, checkpoint: Checkpoint): Promise<void> {
      staged.set(key, checkpoint);
    },
    async flush(): Promise<void> {
      if (staged.size === 0) {
        return;
      }

      const client = await pool.connect();

      try {
        await upsertCheckpoints(client, new Map(staged));
      } finally {
        client.release();
      }
    }
  };
}
