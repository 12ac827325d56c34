// Snapshots — save and restore of engine state as plain JSON data.
// The topology is referenced by id and supplied again on restore.

import type { GameState } from '@/engine/types';
import { gameSnapshotSchema } from '@/lib/snapshot-schema';

export const SNAPSHOT_VERSION = 1;

export interface GameSnapshot extends Omit<GameState, 'topology'> {
  version: typeof SNAPSHOT_VERSION;
  topologyId: string;
}

export function createSnapshot(state: GameState): GameSnapshot {
  const { topology, ...rest } = state;
  const snapshot: GameSnapshot = { version: SNAPSHOT_VERSION, topologyId: topology.id, ...rest };
  return structuredClone(snapshot);
}

/**
 * Validates `raw` and rebuilds the GameState it was taken from. Throws when
 * the data is malformed or belongs to a different topology.
 */
export function restoreSnapshot(raw: unknown, topology: GameState['topology']): GameState {
  const result = gameSnapshotSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.slice(0, 5)
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Snapshot validation failed: ${issues}`);
  }

  const { version: _version, topologyId, ...rest } = result.data;
  if (topologyId !== topology.id) {
    throw new Error(`Snapshot belongs to topology ${topologyId}, not ${topology.id}`);
  }
  return { ...rest, topology };
}

export function serializeSnapshot(state: GameState): string {
  return JSON.stringify(createSnapshot(state));
}

export function parseSnapshot(json: string, topology: GameState['topology']): GameState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new Error(`Failed to parse snapshot JSON: ${String(err)}`);
  }
  return restoreSnapshot(parsed, topology);
}
