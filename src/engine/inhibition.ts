// InhibitionTracker — hyperspace inhibition fields projected by units, and the
// static zones around celestial bodies and wormhole mouths.
// Pure functions over the `inhibition` list carried in GameState.

import type {
  CelestialKind,
  GameState,
  HexCoord,
  InhibitionField,
  Player,
  SectorOffset,
  Topology,
} from '@/engine/types';
import { hexEquals } from '@/engine/hex';
import { SECTOR_CENTER, isInsideCircle, pushToEdge, type Circle } from '@/engine/sector';
import { bodiesInSector, getSystem, wormholeLinks } from '@/engine/topology';
import { getInhibitor } from '@/engine/units';

export interface InhibitionZone extends Circle {
  /** Body, wormhole or unit id the zone belongs to. */
  sourceId: string;
}

/** Radius of the zone every body of a kind carries; 0 means none. */
export const STATIC_ZONE_RADII: Readonly<Record<CelestialKind, number>> = {
  star: 900,
  planet: 800,
  moon: 600,
  asteroid: 400,
  wormhole_mouth: 500,
  nebula: 0,
  storm: 0,
  comet: 200,
  debris_field: 0,
  asteroid_field: 300,
  ice_field: 150,
};

// ---------------------------------------------------------------------------
// Hostility
// ---------------------------------------------------------------------------

/** Two players are hostile when they differ and neither lists the other as an ally. */
export function areHostile(players: Player[], a: string, b: string): boolean {
  if (a === b) return false;
  const pa = players.find((p) => p.id === a);
  const pb = players.find((p) => p.id === b);
  if (pa?.allies.includes(b)) return false;
  if (pb?.allies.includes(a)) return false;
  return true;
}

// ---------------------------------------------------------------------------
// Field bookkeeping
// ---------------------------------------------------------------------------

/** Adds `field`, replacing any field already projected by the same unit. */
export function activate(fields: InhibitionField[], field: InhibitionField): InhibitionField[] {
  return [...fields.filter((f) => f.unitId !== field.unitId), { ...field, sector: { ...field.sector } }];
}

export function deactivate(fields: InhibitionField[], unitId: string): InhibitionField[] {
  return fields.filter((f) => f.unitId !== unitId);
}

/** Fields of destroyed units go the same way as switched-off ones. */
export const removeForUnit = deactivate;

/** Moves a unit's field with it after a jump. No-op when the unit projects none. */
export function relocate(
  fields: InhibitionField[],
  unitId: string,
  systemId: string,
  sector: HexCoord,
): InhibitionField[] {
  if (!fields.some((f) => f.unitId === unitId)) return fields;
  return fields.map((f) =>
    f.unitId === unitId ? { ...f, systemId, sector: { ...sector } } : f,
  );
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function fieldsAt(
  fields: InhibitionField[],
  systemId: string,
  sector: HexCoord,
): InhibitionField[] {
  return fields.filter((f) => f.systemId === systemId && hexEquals(f.sector, sector));
}

/** True iff a field owned by a player hostile to `forPlayer` covers the sector. */
export function isBlocked(
  state: { players: Player[]; inhibition: InhibitionField[] },
  systemId: string,
  sector: HexCoord,
  forPlayer: string,
): boolean {
  return fieldsAt(state.inhibition, systemId, sector).some((f) =>
    areHostile(state.players, f.owner, forPlayer),
  );
}

// ---------------------------------------------------------------------------
// Zones
// ---------------------------------------------------------------------------

/** Zones of the bodies in a sector, then of the wormhole mouths there. */
export function staticZones(topology: Topology, systemId: string, sector: HexCoord): InhibitionZone[] {
  const system = getSystem(topology, systemId);
  if (!system) return [];
  const zones: InhibitionZone[] = [];
  for (const body of bodiesInSector(system, sector)) {
    const radius = STATIC_ZONE_RADII[body.kind];
    if (radius > 0) zones.push({ sourceId: body.id, center: { ...body.offset }, radius });
  }
  for (const link of wormholeLinks(topology, systemId)) {
    if (!hexEquals(link.departureSector, sector)) continue;
    zones.push({
      sourceId: link.wormhole.id,
      center: { ...SECTOR_CENTER },
      radius: STATIC_ZONE_RADII.wormhole_mouth,
    });
  }
  return zones;
}

/** Zones of active inhibitors in a sector, centred on the projecting unit. */
export function fieldZones(
  state: Pick<GameState, 'units' | 'inhibition'>,
  systemId: string,
  sector: HexCoord,
): InhibitionZone[] {
  const zones: InhibitionZone[] = [];
  for (const field of fieldsAt(state.inhibition, systemId, sector)) {
    const unit = state.units.find((u) => u.id === field.unitId);
    const inhibitor = unit ? getInhibitor(unit) : undefined;
    if (!unit || !inhibitor) continue;
    zones.push({ sourceId: unit.id, center: { ...unit.position.offset }, radius: inhibitor.radius });
  }
  return zones;
}

export function zonesAt(
  state: Pick<GameState, 'topology' | 'units' | 'inhibition'>,
  systemId: string,
  sector: HexCoord,
): InhibitionZone[] {
  return [...staticZones(state.topology, systemId, sector), ...fieldZones(state, systemId, sector)];
}

/**
 * Where a jump aimed at `point` actually lands: just outside the first zone
 * containing it, or `point` itself when no zone does.
 */
export function clearArrival(zones: InhibitionZone[], point: SectorOffset): SectorOffset {
  const zone = zones.find((z) => isInsideCircle(point, z));
  return zone ? pushToEdge(point, zone) : { ...point };
}
