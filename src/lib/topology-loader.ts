// Topology loader — validates an externally generated galaxy and returns a
// typed Topology. Shape checks come from Zod; graph checks are done here.

import type { Topology } from '@/engine/types';
import { topologySchema } from '@/lib/topology-schema';
import { hexKey, isWithinRadius } from '@/engine/hex';
import { isInsideSector } from '@/engine/sector';
import { isColonizable } from '@/engine/topology';

export interface TopologyLoadOptions {
  /** Offsets of celestial objects must fall inside this circle. */
  sectorRadius?: number;
}

const DEFAULT_SECTOR_RADIUS = 1000;

function pairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

function isConnected(topology: Topology): boolean {
  const adjacency = new Map<string, string[]>();
  for (const system of topology.systems) adjacency.set(system.id, []);
  for (const w of topology.wormholes) {
    adjacency.get(w.a.systemId)?.push(w.b.systemId);
    adjacency.get(w.b.systemId)?.push(w.a.systemId);
  }

  const start = topology.systems[0];
  if (!start) return true;
  const visited = new Set<string>([start.id]);
  const queue: string[] = [start.id];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of adjacency.get(current) ?? []) {
      if (visited.has(next)) continue;
      visited.add(next);
      queue.push(next);
    }
  }
  return visited.size === topology.systems.length;
}

function findGraphIssues(topology: Topology, sectorRadius: number): string[] {
  const issues: string[] = [];
  const systems = new Map(topology.systems.map((s) => [s.id, s]));
  if (systems.size !== topology.systems.length) {
    issues.push('systems: duplicate system id');
  }

  const bodyIds = new Set<string>();
  for (const system of topology.systems) {
    for (const body of system.bodies) {
      if (bodyIds.has(body.id)) issues.push(`systems.${system.id}: duplicate body id ${body.id}`);
      bodyIds.add(body.id);
      if (!isWithinRadius(body.sector, system.radius)) {
        issues.push(`systems.${system.id}.${body.id}: sector ${hexKey(body.sector)} outside radius ${system.radius}`);
      }
      if (!isInsideSector(body.offset, sectorRadius)) {
        issues.push(`systems.${system.id}.${body.id}: offset outside sector`);
      }
      if (isColonizable(body) && body.bodyClass === null) {
        issues.push(`systems.${system.id}.${body.id}: colonizable body has no bodyClass`);
      }
    }
  }

  const pairs = new Set<string>();
  for (const w of topology.wormholes) {
    if (w.a.systemId === w.b.systemId) {
      issues.push(`wormholes.${w.id}: self-loop on ${w.a.systemId}`);
      continue;
    }
    for (const end of [w.a, w.b]) {
      const system = systems.get(end.systemId);
      if (!system) {
        issues.push(`wormholes.${w.id}: unknown system ${end.systemId}`);
      } else if (!isWithinRadius(end.sector, system.radius)) {
        issues.push(`wormholes.${w.id}: mouth ${hexKey(end.sector)} outside ${end.systemId}`);
      }
    }
    const key = pairKey(w.a.systemId, w.b.systemId);
    if (pairs.has(key)) issues.push(`wormholes.${w.id}: duplicate edge ${key}`);
    pairs.add(key);
  }

  if (issues.length === 0 && !topology.disconnected && !isConnected(topology)) {
    issues.push('wormholes: galaxy graph is not connected');
  }

  return issues;
}

export function loadTopology(raw: unknown, options: TopologyLoadOptions = {}): Topology {
  if (raw === null || typeof raw !== 'object') {
    throw new Error('Topology data must be a non-null object');
  }

  const result = topologySchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.slice(0, 5)
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Topology validation failed: ${issues}`);
  }

  const topology: Topology = result.data;
  const graphIssues = findGraphIssues(topology, options.sectorRadius ?? DEFAULT_SECTOR_RADIUS);
  if (graphIssues.length > 0) {
    throw new Error(`Topology validation failed: ${graphIssues.slice(0, 5).join('; ')}`);
  }

  return topology;
}

export function loadTopologyFromJson(json: string, options?: TopologyLoadOptions): Topology {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new Error(`Failed to parse topology JSON: ${String(err)}`);
  }
  return loadTopology(parsed, options);
}
