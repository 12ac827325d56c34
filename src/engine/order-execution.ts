// Order execution — one dispatch entry per order kind.
// Each handler validates an order against the current state and executes one
// turn's worth of it. Pure functions: the input state is never mutated.

import type {
  AttackOrder,
  CelestialObject,
  ColonizeOrder,
  ComponentKind,
  ConstructOrder,
  CooldownBlock,
  GameState,
  JumpHexOrder,
  JumpWormholeOrder,
  LoadColonistsOrder,
  MoveOrder,
  Order,
  OrderError,
  OrderKind,
  OrderOutcome,
  ToggleInhibitorOrder,
  Unit,
} from '@/engine/types';
import type { RulesetPackage, StructureDefinition } from '@/rules/schema';
import { hexEquals, hexKey } from '@/engine/hex';
import {
  SECTOR_CENTER,
  circlesOverlap,
  isCircleInsideSector,
  isInsideSector,
  offsetDistance,
  pointAtDistance,
  stepTowards,
} from '@/engine/sector';
import { findBody, getSystem, isColonizable } from '@/engine/topology';
import { plan, type MovementOrder } from '@/engine/pathfinding';
import {
  activate,
  areHostile,
  deactivate,
  isBlocked,
  relocate,
  removeForUnit,
  zonesAt,
} from '@/engine/inhibition';
import {
  createUnit,
  fastestEngine,
  getColonyPod,
  getConstructor,
  getInhibitor,
  getUnit,
  getUnitTemplate,
  getWeapons,
  hasComponent,
  replaceUnit,
  updateComponent,
} from '@/engine/units';
import {
  canAfford,
  getBodyClass,
  getBodyState,
  getPlayer,
  spendResources,
  updatePlayer,
} from '@/engine/economy';

// ---------------------------------------------------------------------------
// Handler contract
// ---------------------------------------------------------------------------

export interface ExecutionResult {
  state: GameState;
  outcome: OrderOutcome;
  reason?: OrderError | CooldownBlock;
  /** Replaces the head order when it stays queued with new progress. */
  order?: Order;
  messages: string[];
  destroyed: string[];
}

export interface OrderHandler<O extends Order> {
  /** Component the order needs; reported in `missing_component`. */
  component: ComponentKind;
  /** Other components that also satisfy the requirement. */
  alternatives?: ComponentKind[];
  validate(state: GameState, ruleset: RulesetPackage, unit: Unit, order: O): OrderError | null;
  execute(state: GameState, ruleset: RulesetPackage, unit: Unit, order: O): ExecutionResult;
}

type OrderMap = { [K in OrderKind]: Extract<Order, { kind: K }> };

export type OrderHandlers = { [K in OrderKind]: OrderHandler<OrderMap[K]> };

function illegal(detail: string): OrderError {
  return { code: 'illegal_target', detail };
}

function done(state: GameState, outcome: OrderOutcome, messages: string[]): ExecutionResult {
  return { state, outcome, messages, destroyed: [] };
}

function failed(state: GameState, reason: OrderError | CooldownBlock): ExecutionResult {
  return {
    state,
    outcome: reason.code === 'cooldown' ? 'blocked' : 'failed',
    reason,
    messages: [],
    destroyed: [],
  };
}

/** Unit with a new position; drags its inhibition field along. */
function moveUnit(state: GameState, unit: Unit): GameState {
  const next = replaceUnit(state, unit);
  return {
    ...next,
    inhibition: relocate(next.inhibition, unit.id, unit.position.systemId, unit.position.sector),
  };
}

function sameSector(a: Unit, b: Unit): boolean {
  return a.position.systemId === b.position.systemId && hexEquals(a.position.sector, b.position.sector);
}

// ---------------------------------------------------------------------------
// Movement
// ---------------------------------------------------------------------------

function executeMovement(
  state: GameState,
  unit: Unit,
  order: MovementOrder,
): ExecutionResult {
  const result = plan(state, unit, order);
  if (!result.ok) return failed(state, result.error);
  const step = result.plan;

  switch (step.kind) {
    case 'move': {
      const moved: Unit = { ...unit, position: { ...unit.position, offset: step.to } };
      const next = replaceUnit(state, moved);
      if (step.arrived) {
        return done(next, 'completed', [`${unit.name} reached (${step.to.x}, ${step.to.y})`]);
      }
      return {
        ...done(next, 'in_progress', [`${unit.name} moving, ${Math.round(step.remaining)} to go`]),
        order: { ...order, progress: { ...order.progress, remaining: step.remaining } },
      };
    }
    case 'jump_hex': {
      const jumped = updateComponent(
        { ...unit, position: { systemId: unit.position.systemId, sector: step.to, offset: step.arrival } },
        step.drive,
        (d) => ({ ...d, cooldownRemaining: d.cooldown }),
      );
      return done(moveUnit(state, jumped), 'completed', [
        `${unit.name} jumped to sector ${hexKey(step.to)}`,
      ]);
    }
    case 'jump_wormhole': {
      const jumped = updateComponent(
        {
          ...unit,
          position: {
            systemId: step.link.systemId,
            sector: { ...step.link.arrivalSector },
            offset: { ...SECTOR_CENTER },
          },
        },
        step.drive,
        (d) => ({ ...d, cooldownRemaining: d.cooldown }),
      );
      const next = moveUnit(state, jumped);
      const message = `${unit.name} jumped through ${step.link.wormhole.id} to ${step.link.systemId}`;
      if (step.finalHop) return done(next, 'completed', [message]);
      const hops = (order.progress?.hops ?? 0) + 1;
      return {
        ...done(next, 'in_progress', [message]),
        order: { ...order, progress: { ...order.progress, hops } },
      };
    }
  }
}

const moveHandler: OrderHandler<MoveOrder> = {
  component: 'engine',
  validate(state, _ruleset, _unit, order) {
    if (!isInsideSector(order.target, state.config.sectorRadius)) {
      return illegal('move target lies outside the sector');
    }
    return null;
  },
  execute: (state, _ruleset, unit, order) => executeMovement(state, unit, order),
};

const jumpHexHandler: OrderHandler<JumpHexOrder> = {
  component: 'hyperdrive_basic',
  alternatives: ['hyperdrive_advanced'],
  validate(state, _ruleset, unit, order) {
    const { systemId, sector } = unit.position;
    if (isBlocked(state, systemId, order.target, unit.owner)) {
      return { code: 'inhibited', systemId, sector: order.target };
    }
    if (isBlocked(state, systemId, sector, unit.owner)) {
      return { code: 'inhibited', systemId, sector };
    }
    return null;
  },
  execute: (state, _ruleset, unit, order) => executeMovement(state, unit, order),
};

const jumpWormholeHandler: OrderHandler<JumpWormholeOrder> = {
  component: 'hyperdrive_advanced',
  validate(state, _ruleset, unit, order) {
    if (!getSystem(state.topology, order.targetSystemId)) {
      return illegal(`unknown system ${order.targetSystemId}`);
    }
    const { systemId, sector } = unit.position;
    if (isBlocked(state, systemId, sector, unit.owner)) {
      return { code: 'inhibited', systemId, sector };
    }
    return null;
  },
  execute: (state, _ruleset, unit, order) => executeMovement(state, unit, order),
};

// ---------------------------------------------------------------------------
// Inhibitor
// ---------------------------------------------------------------------------

/** A new field must fit inside the sector and stay clear of every other zone. */
function fieldPlacementError(state: GameState, unit: Unit, radius: number): OrderError | null {
  const field = { center: unit.position.offset, radius };
  if (!isCircleInsideSector(field, state.config.sectorRadius)) {
    return illegal('inhibition field would cross the sector boundary');
  }
  const { systemId, sector } = unit.position;
  const clash = zonesAt(state, systemId, sector).find(
    (zone) => zone.sourceId !== unit.id && circlesOverlap(field, zone),
  );
  return clash ? illegal(`inhibition field would overlap ${clash.sourceId}`) : null;
}

const toggleInhibitorHandler: OrderHandler<ToggleInhibitorOrder> = {
  component: 'inhibitor',
  validate(state, _ruleset, unit, order) {
    const inhibitor = getInhibitor(unit);
    if (!inhibitor || !order.on || inhibitor.active) return null;
    return fieldPlacementError(state, unit, inhibitor.radius);
  },
  execute(state, _ruleset, unit, order) {
    const inhibitor = getInhibitor(unit);
    if (!inhibitor) return failed(state, { code: 'missing_component', component: 'inhibitor' });
    if (inhibitor.active === order.on) {
      return done(state, 'completed', [`${unit.name} inhibitor already ${order.on ? 'on' : 'off'}`]);
    }
    if (order.on) {
      const blocked = fieldPlacementError(state, unit, inhibitor.radius);
      if (blocked) return failed(state, blocked);
    }

    const toggled = updateComponent(unit, inhibitor, (c) => ({ ...c, active: order.on }));
    const next = replaceUnit(state, toggled);
    const inhibition = order.on
      ? activate(next.inhibition, {
          unitId: unit.id,
          owner: unit.owner,
          systemId: unit.position.systemId,
          sector: unit.position.sector,
        })
      : deactivate(next.inhibition, unit.id);

    return done({ ...next, inhibition }, 'completed', [
      `${unit.name} inhibitor ${order.on ? 'engaged' : 'disengaged'} at ${unit.position.systemId} ${hexKey(unit.position.sector)}`,
    ]);
  },
};

// ---------------------------------------------------------------------------
// Colonisation
// ---------------------------------------------------------------------------

/** Body in the unit's own sector, or an error explaining why not. */
function locateLocalBody(
  state: GameState,
  unit: Unit,
  bodyId: string,
): { ok: true; body: CelestialObject } | { ok: false; error: OrderError } {
  const found = findBody(state.topology, bodyId);
  if (!found) return { ok: false, error: illegal(`unknown body ${bodyId}`) };
  if (found.system.id !== unit.position.systemId || !hexEquals(found.body.sector, unit.position.sector)) {
    return { ok: false, error: illegal(`${bodyId} is not in the unit's sector`) };
  }
  return { ok: true, body: found.body };
}

const colonizeHandler: OrderHandler<ColonizeOrder> = {
  component: 'colony',
  validate(state, _ruleset, unit, order) {
    const located = locateLocalBody(state, unit, order.bodyId);
    if (!located.ok) return located.error;
    if (!isColonizable(located.body)) return illegal(`${order.bodyId} cannot be colonized`);
    const owner = getBodyState(state, order.bodyId).owner;
    if (owner !== null && owner !== unit.owner) return illegal(`${order.bodyId} belongs to ${owner}`);
    if ((getColonyPod(unit)?.cargo ?? 0) <= 0) return illegal('no colonists aboard');
    return null;
  },
  execute(state, ruleset, unit, order) {
    const pod = getColonyPod(unit);
    const found = findBody(state.topology, order.bodyId);
    if (!pod || !found) return failed(state, illegal(`cannot colonize ${order.bodyId}`));

    const capacity = getBodyClass(ruleset, found.body)?.capacity ?? 0;
    const body = getBodyState(state, order.bodyId);
    const population = Math.min(capacity, body.population + pod.cargo);
    const landed = Math.max(0, population - body.population);

    const unloaded = updateComponent(unit, pod, (c) => ({ ...c, cargo: c.cargo - landed }));
    const next = replaceUnit(state, unloaded);
    return done(
      { ...next, bodies: { ...next.bodies, [order.bodyId]: { ...body, owner: unit.owner, population } } },
      'completed',
      [`${unit.name} landed ${landed} colonists on ${found.body.name}`],
    );
  },
};

const loadColonistsHandler: OrderHandler<LoadColonistsOrder> = {
  component: 'colony',
  validate(state, _ruleset, unit, order) {
    const located = locateLocalBody(state, unit, order.bodyId);
    if (!located.ok) return located.error;
    const body = getBodyState(state, order.bodyId);
    if (body.owner !== unit.owner) return illegal(`${order.bodyId} is not owned by ${unit.owner}`);
    if (body.population <= 0) return illegal(`${order.bodyId} has no population`);
    const pod = getColonyPod(unit);
    if (pod && pod.cargo >= pod.maxCargo) return illegal('colony pod is full');
    return null;
  },
  execute(state, _ruleset, unit, order) {
    const pod = getColonyPod(unit);
    if (!pod) return failed(state, { code: 'missing_component', component: 'colony' });

    const body = getBodyState(state, order.bodyId);
    const amount = Math.min(order.amount, pod.maxCargo - pod.cargo, body.population);
    const loaded = updateComponent(unit, pod, (c) => ({ ...c, cargo: c.cargo + amount }));
    const next = replaceUnit(state, loaded);
    return done(
      { ...next, bodies: { ...next.bodies, [order.bodyId]: { ...body, population: body.population - amount } } },
      'completed',
      [`${unit.name} loaded ${amount} colonists from ${order.bodyId}`],
    );
  },
};

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function findStructure(ruleset: RulesetPackage, structureId: string): StructureDefinition | undefined {
  return ruleset.structures.find((s) => s.id === structureId);
}

const constructHandler: OrderHandler<ConstructOrder> = {
  component: 'constructor',
  validate(state, ruleset, unit, order) {
    const builder = getConstructor(unit);
    if (!builder) return { code: 'missing_component', component: 'constructor' };
    const structure = findStructure(ruleset, order.structureId);
    if (!structure || !builder.buildable.includes(structure.id)) {
      return illegal(`cannot build ${order.structureId}`);
    }
    if (builder.project) {
      return illegal(`already building ${builder.project.structureId}`);
    }

    if (structure.kind === 'extractor') {
      if (!order.bodyId) return illegal(`${structure.id} needs a body`);
      const located = locateLocalBody(state, unit, order.bodyId);
      if (!located.ok) return located.error;
      const kind = located.body.kind;
      if (!structure.allowedBodyKinds.some((k) => k === kind)) {
        return illegal(`${structure.id} cannot be built on a ${kind}`);
      }
      const body = getBodyState(state, order.bodyId);
      if (body.extractor) return illegal(`${order.bodyId} already has an extractor`);
      if (body.owner !== null && body.owner !== unit.owner) {
        return illegal(`${order.bodyId} belongs to ${body.owner}`);
      }
    } else if (!isInsideSector(order.offset ?? unit.position.offset, state.config.sectorRadius)) {
      return illegal('build site lies outside the sector');
    }

    const available = getPlayer(state, unit.owner)?.resources ?? { credits: 0, metal: 0, crystal: 0 };
    if (!canAfford(available, structure.cost)) {
      return { code: 'insufficient_resources', required: { ...structure.cost }, available: { ...available } };
    }
    return null;
  },
  execute(state, ruleset, unit, order) {
    const builder = getConstructor(unit);
    const structure = findStructure(ruleset, order.structureId);
    const player = getPlayer(state, unit.owner);
    if (!builder || !structure || !player) return failed(state, illegal(`cannot build ${order.structureId}`));

    const building = updateComponent(unit, builder, (c) => ({
      ...c,
      project: {
        structureId: structure.id,
        bodyId: structure.kind === 'extractor' ? order.bodyId ?? null : null,
        offset: { ...(order.offset ?? unit.position.offset) },
        turnsRemaining: structure.buildTurns,
      },
    }));
    const paid = updatePlayer(replaceUnit(state, building), {
      ...player,
      resources: spendResources(player.resources, structure.cost),
    });
    return done(paid, 'completed', [
      `${unit.name} started ${structure.name} (${structure.buildTurns} turns)`,
    ]);
  },
};

/**
 * Advances the unit's construction project by one turn and completes it when
 * due. Spawned units take the next unit sequence number.
 */
export function advanceConstruction(
  state: GameState,
  ruleset: RulesetPackage,
  unitId: string,
): { state: GameState; created: string[]; messages: string[] } {
  const unit = getUnit(state, unitId);
  const builder = unit ? getConstructor(unit) : undefined;
  const project = builder?.project;
  if (!unit || !builder || !project) return { state, created: [], messages: [] };

  const turnsRemaining = project.turnsRemaining - 1;
  if (turnsRemaining > 0) {
    const progressed = updateComponent(unit, builder, (c) => ({
      ...c,
      project: { ...project, turnsRemaining },
    }));
    return { state: replaceUnit(state, progressed), created: [], messages: [] };
  }

  const idle = updateComponent(unit, builder, (c) => ({ ...c, project: null }));
  const next = replaceUnit(state, idle);
  const structure = findStructure(ruleset, project.structureId);
  if (!structure) {
    return { state: next, created: [], messages: [`${unit.name} abandoned unknown ${project.structureId}`] };
  }

  if (structure.kind === 'extractor') {
    if (project.bodyId === null) return { state: next, created: [], messages: [] };
    const site = findBody(next.topology, project.bodyId);
    const onSite =
      site !== undefined &&
      site.system.id === unit.position.systemId &&
      hexEquals(site.body.sector, unit.position.sector);
    if (!onSite) {
      return {
        state: next,
        created: [],
        messages: [`${unit.name} could not finish ${structure.name}: left ${project.bodyId}`],
      };
    }
    const body = getBodyState(next, project.bodyId);
    if (body.owner !== null && body.owner !== unit.owner) {
      return {
        state: next,
        created: [],
        messages: [`${unit.name} could not finish ${structure.name}: ${project.bodyId} was claimed by ${body.owner}`],
      };
    }
    return {
      state: {
        ...next,
        bodies: { ...next.bodies, [project.bodyId]: { ...body, owner: unit.owner, extractor: true } },
      },
      created: [],
      messages: [`${unit.name} completed ${structure.name} on ${project.bodyId}`],
    };
  }

  const template = getUnitTemplate(ruleset, structure.unitTemplateId);
  const spawned = createUnit(
    ruleset,
    template,
    unit.owner,
    { ...unit.position, offset: project.offset },
    next.nextUnitSeq,
  );
  return {
    state: { ...next, units: [...next.units, spawned], nextUnitSeq: next.nextUnitSeq + 1 },
    created: [spawned.id],
    messages: [`${unit.name} completed ${structure.name} (${spawned.id})`],
  };
}

// ---------------------------------------------------------------------------
// Combat
// ---------------------------------------------------------------------------

// Slack for float error in offsets computed by a previous close-in step
const RANGE_TOLERANCE = 1e-6;

const attackHandler: OrderHandler<AttackOrder> = {
  component: 'weapon',
  validate(state, _ruleset, unit, order) {
    const target = getUnit(state, order.targetUnitId);
    if (!target) return illegal(`unknown unit ${order.targetUnitId}`);
    if (!areHostile(state.players, unit.owner, target.owner)) {
      return illegal(`${target.id} is not hostile`);
    }
    if (!sameSector(unit, target)) return illegal(`${target.id} is not in the unit's sector`);
    return null;
  },
  execute(state, _ruleset, unit, order) {
    const target = getUnit(state, order.targetUnitId);
    if (!target) return failed(state, illegal(`unknown unit ${order.targetUnitId}`));

    const distance = offsetDistance(unit.position.offset, target.position.offset);
    const weapons = getWeapons(unit);
    const inRange = weapons.filter((w) => w.turret.range + RANGE_TOLERANCE >= distance);

    if (inRange.length === 0) {
      const engine = fastestEngine(unit);
      if (!engine) return failed(state, illegal(`${target.id} is out of range`));
      const reach = Math.max(...weapons.map((w) => w.turret.range));
      // Within one step: stop exactly at the longest turret's reach
      const offset =
        distance - reach <= engine.speed
          ? pointAtDistance(target.position.offset, unit.position.offset, reach)
          : stepTowards(unit.position.offset, target.position.offset, engine.speed).position;
      const closer: Unit = { ...unit, position: { ...unit.position, offset } };
      return done(replaceUnit(state, closer), 'in_progress', [`${unit.name} closing on ${target.id}`]);
    }

    const ready = inRange.filter((w) => w.cooldownRemaining === 0);
    if (ready.length === 0) {
      const turnsRemaining = Math.min(...inRange.map((w) => w.cooldownRemaining));
      return failed(state, { code: 'cooldown', turnsRemaining });
    }

    let attacker = unit;
    let damage = 0;
    for (const weapon of ready) {
      damage += weapon.turret.damage;
      attacker = updateComponent(attacker, weapon, (w) => ({ ...w, cooldownRemaining: w.turret.cooldown }));
    }
    const next = replaceUnit(state, attacker);
    const hullPoints = target.hullPoints - damage;

    if (hullPoints <= 0) {
      return {
        state: {
          ...next,
          units: next.units.filter((u) => u.id !== target.id),
          inhibition: removeForUnit(next.inhibition, target.id),
        },
        outcome: 'completed',
        messages: [`${unit.name} destroyed ${target.name}`],
        destroyed: [target.id],
      };
    }

    return done(replaceUnit(next, { ...target, hullPoints }), 'in_progress', [
      `${unit.name} hit ${target.name} for ${damage} (${hullPoints}/${target.maxHullPoints})`,
    ]);
  },
};

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export const ORDER_HANDLERS: OrderHandlers = {
  move: moveHandler,
  jump_hex: jumpHexHandler,
  jump_wormhole: jumpWormholeHandler,
  toggle_inhibitor: toggleInhibitorHandler,
  colonize: colonizeHandler,
  load_colonists: loadColonistsHandler,
  construct: constructHandler,
  attack: attackHandler,
};

function checkOrder<K extends OrderKind>(
  kind: K,
  order: OrderMap[K],
  state: GameState,
  ruleset: RulesetPackage,
  unit: Unit,
): OrderError | null {
  const handler: OrderHandler<OrderMap[K]> = ORDER_HANDLERS[kind];
  const accepted = [handler.component, ...(handler.alternatives ?? [])];
  if (!accepted.some((c) => hasComponent(unit, c))) {
    return { code: 'missing_component', component: handler.component };
  }
  return handler.validate(state, ruleset, unit, order);
}

function runOrder<K extends OrderKind>(
  kind: K,
  order: OrderMap[K],
  state: GameState,
  ruleset: RulesetPackage,
  unit: Unit,
): ExecutionResult {
  const handler: OrderHandler<OrderMap[K]> = ORDER_HANDLERS[kind];
  return handler.execute(state, ruleset, unit, order);
}

/** Component presence first, then the order's own target checks. */
export function validateOrder(
  state: GameState,
  ruleset: RulesetPackage,
  unit: Unit,
  order: Order,
): OrderError | null {
  return checkOrder(order.kind, order, state, ruleset, unit);
}

export function executeOrder(
  state: GameState,
  ruleset: RulesetPackage,
  unit: Unit,
  order: Order,
): ExecutionResult {
  return runOrder(order.kind, order, state, ruleset, unit);
}
