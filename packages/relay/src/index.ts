import { createHistoryClient } from "./api/historyClient";
import { createHttpSink } from "./api/httpSink";
import { loadConfig, sourceIdentityFromUrl } from "./config";
import { createPgCheckpointStore } from "./db/checkpointStore";
import { runMigrations } from "./db/migrations";
import { createPool } from "./db/pool";
import { isRunCancelled } from "./errors";
import { createLoggers, type Loggers } from "./logger";
import { runRelay } from "./relay/pollDispatchLoop";
import { createProgressLogger } from "./relay/progressLogger";
import type { RelayConfig } from "./types";

function listenForShutdown(controller: AbortController, loggers: Loggers): void {
  const onSignal = (signal: NodeJS.Signals): void => {
    loggers.root.info({ signal }, "shutdown requested");
    controller.abort();
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

async function relay(
  config: RelayConfig,
  loggers: Loggers,
  controller: AbortController
): Promise<void> {
  const sourceIdentity = sourceIdentityFromUrl(config.sourceBaseUrl);
  const pool = createPool(config.databaseUrl);

  const progressLogger = createProgressLogger({
    intervalMs: config.progressLogIntervalMs,
    log: (message) => loggers.relay.info(message)
  });

  try {
    const applied = await runMigrations(pool, {
      migrationsDir: config.migrationsDir ?? undefined,
      logger: loggers.db
    });

    const source = createHistoryClient(config, { logger: loggers.source });
    const apiVersion = await source.apiVersion(controller.signal);

    loggers.relay.info(
      {
        sourceIdentity,
        apiVersion,
        migrationsApplied: applied,
        replayWindowMs: config.checkpoint.maxReplayAgeMs,
        flushPeriodMs: config.checkpoint.flushPeriodMs,
        payloadEncoding: config.payloadEncoding
      },
      "configuring checkpointing"
    );

    if (config.checkpoint.maxReplayAgeMs === 0) {
      loggers.relay.warn("disabling event replay: maxAgeSeconds set to 0");
    }

    await runRelay(
      {
        source,
        sink: createHttpSink(config, { logger: loggers.sink }),
        store: createPgCheckpointStore(pool),
        logger: loggers.relay,
        checkpointKey: config.checkpointKey,
        checkpointConfig: config.checkpoint,
        convert: {
          sourceIdentity,
          apiVersion,
          encoding: config.payloadEncoding
        },
        hooks: {
          onBatch: (details) => progressLogger.onBatch(details),
          onFlush: (checkpoint) => progressLogger.onFlush(checkpoint.lastEventKey)
        }
      },
      controller.signal
    );
  } finally {
    progressLogger.flush();
    await pool.end();
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const loggers = createLoggers(config.logLevel);
  const controller = new AbortController();
  listenForShutdown(controller, loggers);

  try {
    await relay(config, loggers, controller);
  } catch (error) {
    if (isRunCancelled(error) || controller.signal.aborted) {
      loggers.root.info("relay stopped");
      return;
    }

    loggers.root.fatal({ err: error }, "relay failed");
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error("relay failed to start", error);
  process.exit(1);
});
