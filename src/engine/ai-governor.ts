// AI governor — chooses orders for the idle units of computer players.
// Covers combat, inhibitor control, colonisation, extractor building and
// wormhole exploration. The turn resolver submits the returned orders through
// the normal order queue.
// Pure function: reads state, draws only from the PRNG it is handed.

import type { CelestialObject, GameState, OrderDraft, PRNG, Unit } from '@/engine/types';
import type { RulesetPackage } from '@/rules/schema';
import { hexDistance, hexEquals } from '@/engine/hex';
import { bodiesInSector, getSystem, isColonizable, wormholeLinks } from '@/engine/topology';
import { hexJumpWaypoints } from '@/engine/pathfinding';
import { pickOne } from '@/engine/prng';
import { areHostile } from '@/engine/inhibition';
import { canAfford, getBodyState, getPlayer } from '@/engine/economy';
import {
  getColonyPod,
  getConstructor,
  getHyperdrive,
  getInhibitor,
  getWeapons,
  hexJumpDrive,
  isIdle,
} from '@/engine/units';

export interface AIOrder {
  unitId: string;
  order: OrderDraft;
}

// ---------------------------------------------------------------------------
// Helper functions
// ---------------------------------------------------------------------------

function hostilesInSystem(state: GameState, unit: Unit): Unit[] {
  return state.units
    .filter(
      (u) =>
        u.position.systemId === unit.position.systemId &&
        areHostile(state.players, unit.owner, u.owner),
    )
    .sort((a, b) => a.createdSeq - b.createdSeq);
}

/** Unowned colonizable bodies of the unit's system, nearest first. */
function colonyTargets(state: GameState, unit: Unit): CelestialObject[] {
  const system = getSystem(state.topology, unit.position.systemId);
  if (!system) return [];
  return system.bodies
    .filter((b) => isColonizable(b) && getBodyState(state, b.id).owner === null)
    .sort((a, b) => {
      const da = hexDistance(unit.position.sector, a.sector);
      const db = hexDistance(unit.position.sector, b.sector);
      if (da !== db) return da - db;
      return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });
}

function planCombat(state: GameState, unit: Unit, hostiles: Unit[]): OrderDraft | null {
  if (getWeapons(unit).length === 0) return null;
  const target = hostiles.find((h) => hexEquals(h.position.sector, unit.position.sector));
  return target ? { kind: 'attack', targetUnitId: target.id } : null;
}

function planInhibitor(unit: Unit, hostiles: Unit[]): OrderDraft | null {
  const inhibitor = getInhibitor(unit);
  if (!inhibitor) return null;
  const threatened = hostiles.length > 0;
  if (threatened === inhibitor.active) return null;
  return { kind: 'toggle_inhibitor', on: threatened };
}

function planColonisation(state: GameState, unit: Unit): OrderDraft | null {
  const pod = getColonyPod(unit);
  if (!pod || pod.cargo <= 0) return null;

  const [nearest] = colonyTargets(state, unit);
  if (!nearest) return null;
  if (hexEquals(nearest.sector, unit.position.sector)) {
    return { kind: 'colonize', bodyId: nearest.id };
  }

  const drive = hexJumpDrive(unit);
  if (!drive) return null;
  const [next] = hexJumpWaypoints(unit.position.sector, nearest.sector, drive.jumpRange);
  return next ? { kind: 'jump_hex', target: next } : null;
}

function planExtractor(state: GameState, unit: Unit, ruleset: RulesetPackage): OrderDraft | null {
  const builder = getConstructor(unit);
  if (!builder || builder.project) return null;
  const system = getSystem(state.topology, unit.position.systemId);
  const resources = getPlayer(state, unit.owner)?.resources;
  if (!system || !resources) return null;

  for (const structureId of builder.buildable) {
    const structure = ruleset.structures.find((s) => s.id === structureId);
    if (!structure || structure.kind !== 'extractor' || !canAfford(resources, structure.cost)) continue;
    const site = bodiesInSector(system, unit.position.sector).find((b) => {
      if (!structure.allowedBodyKinds.some((k) => k === b.kind)) return false;
      const body = getBodyState(state, b.id);
      return !body.extractor && (body.owner === null || body.owner === unit.owner);
    });
    if (site) return { kind: 'construct', structureId, bodyId: site.id };
  }
  return null;
}

function planExploration(state: GameState, unit: Unit, prng: PRNG): OrderDraft | null {
  const drive = getHyperdrive(unit, 'hyperdrive_advanced');
  if (!drive || drive.cooldownRemaining > 0) return null;
  const link = pickOne(wormholeLinks(state.topology, unit.position.systemId), prng);
  return link ? { kind: 'jump_wormhole', targetSystemId: link.systemId } : null;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * One order per idle unit of `playerId`, in unit creation order. Units that
 * already have queued orders are left alone.
 */
export function planAIOrders(
  state: GameState,
  playerId: string,
  ruleset: RulesetPackage,
  prng: PRNG,
): AIOrder[] {
  const orders: AIOrder[] = [];
  const units = state.units
    .filter((u) => u.owner === playerId && isIdle(u))
    .sort((a, b) => a.createdSeq - b.createdSeq);

  for (const unit of units) {
    const hostiles = hostilesInSystem(state, unit);
    const order =
      planCombat(state, unit, hostiles) ??
      planInhibitor(unit, hostiles) ??
      planColonisation(state, unit) ??
      planExtractor(state, unit, ruleset) ??
      planExploration(state, unit, prng);
    if (order) orders.push({ unitId: unit.id, order });
  }

  return orders;
}
