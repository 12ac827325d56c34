// Topology lookups — read-only queries over the generated galaxy.
// The engine never mutates a Topology; these helpers only read it.

import type {
  CelestialObject,
  ColonizableKind,
  HexCoord,
  StarSystem,
  Topology,
  Wormhole,
  WormholeEndpoint,
} from '@/engine/types';
import { hexEquals } from '@/engine/hex';

export interface WormholeLink {
  wormhole: Wormhole;
  /** System on the far side of the wormhole. */
  systemId: string;
  /** Mouth sector in the far system, where a jump arrives. */
  arrivalSector: HexCoord;
  /** Mouth sector in the near system. */
  departureSector: HexCoord;
  cost: number;
}

const COLONIZABLE_KINDS: readonly ColonizableKind[] = ['planet', 'moon', 'asteroid'];

export function isColonizable(
  body: CelestialObject,
): body is CelestialObject & { kind: ColonizableKind } {
  return COLONIZABLE_KINDS.some((kind) => kind === body.kind);
}

// ---------------------------------------------------------------------------
// Systems & sectors
// ---------------------------------------------------------------------------

export function getSystem(topology: Topology, systemId: string): StarSystem | undefined {
  return topology.systems.find((s) => s.id === systemId);
}

export function bodiesInSector(system: StarSystem, sector: HexCoord): CelestialObject[] {
  return system.bodies.filter((b) => hexEquals(b.sector, sector));
}

export function findBody(
  topology: Topology,
  bodyId: string,
): { system: StarSystem; body: CelestialObject } | undefined {
  for (const system of topology.systems) {
    const body = system.bodies.find((b) => b.id === bodyId);
    if (body) return { system, body };
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Wormhole adjacency
// ---------------------------------------------------------------------------

function endpointsFrom(
  wormhole: Wormhole,
  systemId: string,
): { near: WormholeEndpoint; far: WormholeEndpoint } | null {
  if (wormhole.a.systemId === systemId) return { near: wormhole.a, far: wormhole.b };
  if (wormhole.b.systemId === systemId) return { near: wormhole.b, far: wormhole.a };
  return null;
}

/**
 * Wormholes leaving `systemId`, sorted by far system id then cost so that
 * every caller sees the same order.
 */
export function wormholeLinks(topology: Topology, systemId: string): WormholeLink[] {
  const links: WormholeLink[] = [];
  for (const wormhole of topology.wormholes) {
    const ends = endpointsFrom(wormhole, systemId);
    if (!ends) continue;
    links.push({
      wormhole,
      systemId: ends.far.systemId,
      arrivalSector: ends.far.sector,
      departureSector: ends.near.sector,
      cost: wormhole.cost,
    });
  }
  return links.sort((x, y) => {
    if (x.systemId !== y.systemId) return x.systemId < y.systemId ? -1 : 1;
    return x.cost - y.cost;
  });
}
