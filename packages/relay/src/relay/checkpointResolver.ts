import type { Checkpoint } from "../types";

export type BeginResolution =
  | { kind: "fresh"; beginTime: Date }
  | { kind: "resume"; beginTime: Date; checkpoint: Checkpoint }
  | { kind: "clamped"; beginTime: Date; checkpoint: Checkpoint };

export function hasPosition(checkpoint: Checkpoint | null): checkpoint is Checkpoint {
  if (!checkpoint) {
    return false;
  }

  const timestampMs = checkpoint.lastEventTimestamp.getTime();
  return !Number.isNaN(timestampMs) && timestampMs !== 0;
}

/**
 * Where to begin reading the remote stream. Without a usable checkpoint the
 * stream starts at `now`; a checkpoint older than `now - maxReplayAgeMs` is
 * clamped to that floor and the events in between are skipped.
 */
export function resolveBegin(
  now: Date,
  checkpoint: Checkpoint | null,
  maxReplayAgeMs: number
): BeginResolution {
  if (!hasPosition(checkpoint)) {
    return { kind: "fresh", beginTime: new Date(now.getTime()) };
  }

  const floorMs = now.getTime() - maxReplayAgeMs;

  if (floorMs > checkpoint.lastEventTimestamp.getTime()) {
    return { kind: "clamped", beginTime: new Date(floorMs), checkpoint };
  }

  return {
    kind: "resume",
    beginTime: new Date(checkpoint.lastEventTimestamp.getTime()),
    checkpoint
  };
}
