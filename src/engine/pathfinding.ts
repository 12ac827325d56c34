// PathPlanner — legal movement across the three spatial scales.
// Sub-sector motion, hex jumps inside a system, wormhole jumps between systems.
// Pure functions: no side effects, no randomness.

import type {
  CooldownBlock,
  GameState,
  HexCoord,
  HyperdriveComponent,
  JumpHexOrder,
  JumpWormholeOrder,
  MoveOrder,
  OrderError,
  PathfindingError,
  SectorOffset,
  Topology,
  Unit,
} from '@/engine/types';
import { hexDistance, hexEquals, hexKey, hexLerp, isWithinRadius } from '@/engine/hex';
import { SECTOR_CENTER, isInsideSector, stepTowards } from '@/engine/sector';
import { getSystem, wormholeLinks, type WormholeLink } from '@/engine/topology';
import { fastestEngine, getHyperdrive, hexJumpDrive } from '@/engine/units';
import { clearArrival, isBlocked, zonesAt } from '@/engine/inhibition';

// ---------------------------------------------------------------------------
// Plan types
// ---------------------------------------------------------------------------

export type MovementOrder = MoveOrder | JumpHexOrder | JumpWormholeOrder;

export type MovementPlan =
  | { kind: 'move'; to: SectorOffset; arrived: boolean; remaining: number }
  | { kind: 'jump_hex'; drive: HyperdriveComponent; to: HexCoord; arrival: SectorOffset }
  | {
      kind: 'jump_wormhole';
      drive: HyperdriveComponent;
      link: WormholeLink;
      /** Systems still to visit, the first hop's destination first. */
      route: string[];
      /** True when this hop lands in the order's destination system. */
      finalHop: boolean;
    };

export type PlanResult =
  | { ok: true; plan: MovementPlan }
  | { ok: false; error: OrderError | CooldownBlock };

export interface WormholeRoute {
  /** Systems visited after the start, in order. */
  systems: string[];
  links: WormholeLink[];
  cost: number;
}

export type RouteResult =
  | { ok: true; route: WormholeRoute }
  | { ok: false; error: PathfindingError };

// ---------------------------------------------------------------------------
// Wormhole graph search
// ---------------------------------------------------------------------------

interface Predecessor {
  systemId: string;
  link: WormholeLink;
}

/** True when `candidate` should replace `current` as the predecessor on an equal-cost tie. */
function preferPredecessor(candidate: Predecessor, current: Predecessor | undefined): boolean {
  if (!current) return true;
  if (candidate.systemId !== current.systemId) return candidate.systemId < current.systemId;
  return candidate.link.cost < current.link.cost;
}

/**
 * Dijkstra over the wormhole graph. Equal-cost routes are resolved by the
 * lower predecessor system id, then the cheaper final hop. At most `budget`
 * systems are settled before giving up.
 */
export function findWormholeRoute(
  topology: Topology,
  fromSystemId: string,
  toSystemId: string,
  budget: number,
): RouteResult {
  if (!getSystem(topology, fromSystemId)) {
    return { ok: false, error: { code: 'no_path', detail: `unknown system ${fromSystemId}` } };
  }
  if (!getSystem(topology, toSystemId)) {
    return { ok: false, error: { code: 'no_path', detail: `unknown system ${toSystemId}` } };
  }
  if (fromSystemId === toSystemId) {
    return { ok: true, route: { systems: [], links: [], cost: 0 } };
  }

  const dist = new Map<string, number>([[fromSystemId, 0]]);
  const pred = new Map<string, Predecessor>();
  const settled = new Set<string>();
  let explored = 0;

  for (;;) {
    // Cheapest unsettled system; equal distances go to the lower id
    let current: string | null = null;
    let currentDist = Infinity;
    for (const [systemId, d] of dist) {
      if (settled.has(systemId)) continue;
      if (d < currentDist || (d === currentDist && current !== null && systemId < current)) {
        current = systemId;
        currentDist = d;
      }
    }
    if (current === null) break;

    if (current === toSystemId) {
      return { ok: true, route: buildRoute(pred, fromSystemId, toSystemId, currentDist) };
    }
    if (explored >= budget) {
      return { ok: false, error: { code: 'search_budget_exceeded', explored, budget } };
    }
    settled.add(current);
    explored++;

    for (const link of wormholeLinks(topology, current)) {
      if (settled.has(link.systemId)) continue;
      const candidate = currentDist + link.cost;
      const known = dist.get(link.systemId);
      const via: Predecessor = { systemId: current, link };
      if (known === undefined || candidate < known) {
        dist.set(link.systemId, candidate);
        pred.set(link.systemId, via);
      } else if (candidate === known && preferPredecessor(via, pred.get(link.systemId))) {
        pred.set(link.systemId, via);
      }
    }
  }

  return {
    ok: false,
    error: { code: 'no_path', detail: `no wormhole route from ${fromSystemId} to ${toSystemId}` },
  };
}

function buildRoute(
  pred: Map<string, Predecessor>,
  fromSystemId: string,
  toSystemId: string,
  cost: number,
): WormholeRoute {
  const systems: string[] = [];
  const links: WormholeLink[] = [];
  let step = toSystemId;
  while (step !== fromSystemId) {
    const p = pred.get(step);
    if (!p) break;
    systems.unshift(step);
    links.unshift(p.link);
    step = p.systemId;
  }
  return { systems, links, cost };
}

// ---------------------------------------------------------------------------
// Hex helpers
// ---------------------------------------------------------------------------

/**
 * Splits a long hex trip into jumps of at most `range` sectors each.
 * Returns the stops after `from`, ending with `to`.
 */
export function hexJumpWaypoints(from: HexCoord, to: HexCoord, range: number): HexCoord[] {
  const distance = hexDistance(from, to);
  if (distance === 0 || range <= 0) return [];

  for (let stages = Math.ceil(distance / range); stages <= distance; stages++) {
    const stops: HexCoord[] = [];
    let previous = from;
    let fits = true;
    for (let i = 1; i <= stages; i++) {
      const stop = i === stages ? to : hexLerp(from, to, i / stages);
      if (hexDistance(previous, stop) > range) {
        fits = false;
        break;
      }
      stops.push(stop);
      previous = stop;
    }
    if (fits) return stops;
  }
  return [to];
}

// ---------------------------------------------------------------------------
// Per-order planning
// ---------------------------------------------------------------------------

function planMove(state: GameState, unit: Unit, order: MoveOrder): PlanResult {
  const engine = fastestEngine(unit);
  if (!engine) {
    return { ok: false, error: { code: 'missing_component', component: 'engine' } };
  }
  if (!isInsideSector(order.target, state.config.sectorRadius)) {
    return { ok: false, error: { code: 'illegal_target', detail: 'move target lies outside the sector' } };
  }
  const step = stepTowards(unit.position.offset, order.target, engine.speed);
  return {
    ok: true,
    plan: { kind: 'move', to: step.position, arrived: step.arrived, remaining: step.remaining },
  };
}

function inhibitionError(
  state: GameState,
  unit: Unit,
  systemId: string,
  sector: HexCoord,
): OrderError | null {
  if (isBlocked(state, systemId, sector, unit.owner)) {
    return { code: 'inhibited', systemId, sector };
  }
  const here = unit.position;
  if (isBlocked(state, here.systemId, here.sector, unit.owner)) {
    return { code: 'inhibited', systemId: here.systemId, sector: here.sector };
  }
  return null;
}

function planHexJump(state: GameState, unit: Unit, order: JumpHexOrder): PlanResult {
  const drive = hexJumpDrive(unit);
  if (!drive) {
    return { ok: false, error: { code: 'missing_component', component: 'hyperdrive_basic' } };
  }
  const system = getSystem(state.topology, unit.position.systemId);
  if (!system || !isWithinRadius(order.target, system.radius)) {
    return { ok: false, error: { code: 'no_path', detail: `sector ${hexKey(order.target)} is outside the system` } };
  }
  if (hexEquals(order.target, unit.position.sector)) {
    return { ok: false, error: { code: 'illegal_target', detail: 'already in the target sector' } };
  }
  const distance = hexDistance(unit.position.sector, order.target);
  if (distance > drive.jumpRange) {
    return {
      ok: false,
      error: { code: 'no_path', detail: `sector ${hexKey(order.target)} is ${distance} away, range ${drive.jumpRange}` },
    };
  }
  const arrival = order.arrival ?? SECTOR_CENTER;
  if (!isInsideSector(arrival, state.config.sectorRadius)) {
    return { ok: false, error: { code: 'illegal_target', detail: 'arrival point lies outside the sector' } };
  }
  // Landing inside a zone drops the ship on its rim instead
  const landing = clearArrival(zonesAt(state, system.id, order.target), arrival);
  if (!isInsideSector(landing, state.config.sectorRadius)) {
    return {
      ok: false,
      error: { code: 'illegal_target', detail: `no clear arrival point in sector ${hexKey(order.target)}` },
    };
  }

  const inhibited = inhibitionError(state, unit, system.id, order.target);
  if (inhibited) return { ok: false, error: inhibited };

  if (drive.cooldownRemaining > 0) {
    return { ok: false, error: { code: 'cooldown', turnsRemaining: drive.cooldownRemaining } };
  }

  return { ok: true, plan: { kind: 'jump_hex', drive, to: { ...order.target }, arrival: landing } };
}

function planWormholeJump(state: GameState, unit: Unit, order: JumpWormholeOrder): PlanResult {
  const drive = getHyperdrive(unit, 'hyperdrive_advanced');
  if (!drive) {
    return { ok: false, error: { code: 'missing_component', component: 'hyperdrive_advanced' } };
  }
  if (unit.position.systemId === order.targetSystemId) {
    return { ok: false, error: { code: 'illegal_target', detail: 'already in the target system' } };
  }

  const found = findWormholeRoute(
    state.topology,
    unit.position.systemId,
    order.targetSystemId,
    state.config.searchNodeBudget,
  );
  if (!found.ok) return { ok: false, error: found.error };

  const [link] = found.route.links;
  if (!link) {
    return { ok: false, error: { code: 'no_path', detail: `no wormhole leads to ${order.targetSystemId}` } };
  }

  const inhibited = inhibitionError(state, unit, link.systemId, link.arrivalSector);
  if (inhibited) return { ok: false, error: inhibited };

  if (drive.cooldownRemaining > 0) {
    return { ok: false, error: { code: 'cooldown', turnsRemaining: drive.cooldownRemaining } };
  }

  return {
    ok: true,
    plan: {
      kind: 'jump_wormhole',
      drive,
      link,
      route: found.route.systems,
      finalHop: link.systemId === order.targetSystemId,
    },
  };
}

/**
 * Plans one turn of movement for `order`. Identical inputs always produce
 * identical plans.
 */
export function plan(state: GameState, unit: Unit, order: MovementOrder): PlanResult {
  switch (order.kind) {
    case 'move':
      return planMove(state, unit, order);
    case 'jump_hex':
      return planHexJump(state, unit, order);
    case 'jump_wormhole':
      return planWormholeJump(state, unit, order);
  }
}
