// Shared test fixtures: a four-system chain galaxy, a compact ruleset and
// builders for players, units and components.

import type {
  Component,
  GameState,
  InhibitionField,
  Player,
  Topology,
  Unit,
} from '@/engine/types';
import type { RulesetPackage } from '@/rules/schema';

// ---------------------------------------------------------------------------
// Galaxy: alpha —1— beta —1— gamma —2— delta
// ---------------------------------------------------------------------------

export function makeTopology(): Topology {
  return {
    id: 'test-galaxy',
    systems: [
      {
        id: 'alpha',
        name: 'Alpha',
        radius: 3,
        bodies: [
          { id: 'alpha-star', name: 'Alpha', kind: 'star', sector: { q: 0, r: 0 }, offset: { x: 0, y: 0 }, bodyClass: null },
          { id: 'alpha-1', name: 'Alpha I', kind: 'planet', sector: { q: 1, r: 0 }, offset: { x: 0, y: 0 }, bodyClass: 'terran' },
          { id: 'alpha-1a', name: 'Alpha Ia', kind: 'moon', sector: { q: 1, r: 0 }, offset: { x: 200, y: 0 }, bodyClass: 'moon' },
          { id: 'alpha-belt', name: 'Alpha Belt', kind: 'asteroid', sector: { q: -2, r: 1 }, offset: { x: 0, y: 0 }, bodyClass: 'asteroid' },
        ],
      },
      {
        id: 'beta',
        name: 'Beta',
        radius: 2,
        bodies: [
          { id: 'beta-1', name: 'Beta I', kind: 'planet', sector: { q: 0, r: 1 }, offset: { x: 0, y: 0 }, bodyClass: 'desert' },
        ],
      },
      { id: 'gamma', name: 'Gamma', radius: 2, bodies: [] },
      { id: 'delta', name: 'Delta', radius: 2, bodies: [] },
    ],
    wormholes: [
      { id: 'w-ab', a: { systemId: 'alpha', sector: { q: 2, r: 0 } }, b: { systemId: 'beta', sector: { q: -1, r: 0 } }, cost: 1 },
      { id: 'w-bc', a: { systemId: 'beta', sector: { q: 1, r: 0 } }, b: { systemId: 'gamma', sector: { q: 0, r: -1 } }, cost: 1 },
      { id: 'w-cd', a: { systemId: 'gamma', sector: { q: 1, r: 0 } }, b: { systemId: 'delta', sector: { q: 0, r: 0 } }, cost: 2 },
    ],
    disconnected: false,
  };
}

// ---------------------------------------------------------------------------
// Ruleset
// ---------------------------------------------------------------------------

export function makeRuleset(): RulesetPackage {
  return {
    id: 'test-rules',
    name: 'Test Rules',
    description: '',
    hullClasses: {
      tiny: { capacity: 10, hitPoints: 20 },
      small: { capacity: 25, hitPoints: 50 },
      medium: { capacity: 50, hitPoints: 100 },
      large: { capacity: 100, hitPoints: 200 },
      huge: { capacity: 200, hitPoints: 400 },
    },
    bodyClasses: [
      { id: 'terran', name: 'Terran', kind: 'planet', growthRate: 0.05, capacity: 120, metalYield: 0, crystalYield: 0 },
      { id: 'desert', name: 'Desert', kind: 'planet', growthRate: 0.03, capacity: 80, metalYield: 0, crystalYield: 0 },
      { id: 'moon', name: 'Moon', kind: 'moon', growthRate: 0.01, capacity: 50, metalYield: 0, crystalYield: 10 },
      { id: 'asteroid', name: 'Asteroid', kind: 'asteroid', growthRate: 0.005, capacity: 20, metalYield: 10, crystalYield: 0 },
    ],
    unitTemplates: [
      {
        id: 'scout',
        name: 'Scout',
        hull: 'small',
        components: [
          { kind: 'engine', size: 5, speed: 150 },
          { kind: 'hyperdrive_advanced', size: 10, cooldown: 3, jumpRange: 5 },
        ],
      },
      {
        id: 'station',
        name: 'Station',
        hull: 'large',
        components: [
          { kind: 'weapon', size: 20, turret: { type: 'beam', damage: 15, range: 400, cooldown: 3 } },
          { kind: 'inhibitor', size: 20, radius: 100 },
        ],
      },
    ],
    structures: [
      {
        kind: 'unit',
        id: 'station_mk1',
        name: 'Station Mk.I',
        cost: { credits: 500, metal: 200, crystal: 50 },
        buildTurns: 2,
        unitTemplateId: 'station',
      },
      {
        kind: 'extractor',
        id: 'mining_outpost',
        name: 'Mining Outpost',
        cost: { credits: 150, metal: 50, crystal: 0 },
        buildTurns: 1,
        allowedBodyKinds: ['moon', 'asteroid'],
      },
    ],
    startingFleet: ['scout'],
    economy: {
      taxRate: 0.1,
      startingResources: { credits: 2000, metal: 1000, crystal: 1000 },
      homeworldPopulation: 50,
    },
    defaults: { searchNodeBudget: 64, sectorRadius: 1000, maxQueueLength: 4, aiEnabled: false },
  };
}

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

export function engine(speed = 100): Component {
  return { kind: 'engine', size: 5, speed };
}

export function basicDrive(jumpRange = 5, cooldownRemaining = 0, cooldown = 3): Component {
  return { kind: 'hyperdrive_basic', size: 10, cooldown, jumpRange, cooldownRemaining };
}

export function advancedDrive(cooldownRemaining = 0, cooldown = 3): Component {
  return { kind: 'hyperdrive_advanced', size: 10, cooldown, jumpRange: 5, cooldownRemaining };
}

export function weapon(damage = 10, range = 300, cooldown = 2, cooldownRemaining = 0): Component {
  return {
    kind: 'weapon',
    size: 10,
    turret: { type: 'mass_driver', damage, range, cooldown },
    cooldownRemaining,
  };
}

export function inhibitor(active = false): Component {
  return { kind: 'inhibitor', size: 20, radius: 100, active };
}

export function colonyPod(cargo = 30, maxCargo = 100): Component {
  return { kind: 'colony', size: 10, cargo, maxCargo };
}

export function constructorKit(buildable: string[] = ['station_mk1', 'mining_outpost']): Component {
  return { kind: 'constructor', size: 15, buildable, project: null };
}

// ---------------------------------------------------------------------------
// Players, units, state
// ---------------------------------------------------------------------------

export function makePlayer(id: string, overrides: Partial<Player> = {}): Player {
  return {
    id,
    name: id.toUpperCase(),
    color: '#888888',
    isHuman: true,
    allies: [],
    resources: { credits: 2000, metal: 1000, crystal: 1000 },
    ...overrides,
  };
}

export function makeUnit(id: string, owner: string, overrides: Partial<Unit> = {}): Unit {
  return {
    id,
    name: id,
    owner,
    hull: 'medium',
    components: [],
    position: { systemId: 'alpha', sector: { q: 0, r: 0 }, offset: { x: 0, y: 0 } },
    hullPoints: 100,
    maxHullPoints: 100,
    orders: [],
    createdSeq: 0,
    ...overrides,
  };
}

export function fieldOf(unit: Unit): InhibitionField {
  return {
    unitId: unit.id,
    owner: unit.owner,
    systemId: unit.position.systemId,
    sector: { ...unit.position.sector },
  };
}

export function makeMinimalGameState(overrides: Partial<GameState> = {}): GameState {
  return {
    gameId: 'game-001',
    rulesetId: 'test-rules',
    turn: 1,
    topology: makeTopology(),
    players: [makePlayer('p1'), makePlayer('p2')],
    units: [],
    bodies: {},
    inhibition: [],
    nextUnitSeq: 100,
    nextOrderSeq: 1,
    rngSeed: 42,
    rngState: 42,
    config: { searchNodeBudget: 64, sectorRadius: 1000, maxQueueLength: 4, aiEnabled: false },
    createdAt: '2026-01-01T00:00:00.000Z',
    lastResolvedAt: null,
    ...overrides,
  };
}
