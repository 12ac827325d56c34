// Game state initializer — pure functions, no side effects.
// Builds turn 1 from a validated topology, a ruleset and the player line-up.

import type {
  BodyState,
  GameConfig,
  GameState,
  HexCoord,
  Player,
  SectorOffset,
  Topology,
  Unit,
} from '@/engine/types';
import type { RulesetPackage } from '@/rules/schema';
import { hashSeed } from '@/engine/prng';
import { isWithinRadius } from '@/engine/hex';
import { SECTOR_CENTER } from '@/engine/sector';
import { findBody, getSystem, isColonizable } from '@/engine/topology';
import { createUnit, getUnitTemplate } from '@/engine/units';
import { getBodyClass } from '@/engine/economy';

export { hashSeed };

export function generateGameSeed(gameId: string): number {
  return hashSeed(gameId);
}

export interface PlayerSetup {
  id: string;
  name: string;
  color: string;
  isHuman: boolean;
  allies?: string[];
  home: { systemId: string; sector: HexCoord; offset?: SectorOffset };
  /** Colonizable body the player owns from the start. */
  homeBodyId?: string;
}

export interface GameSetup {
  gameId: string;
  topology: Topology;
  ruleset: RulesetPackage;
  players: PlayerSetup[];
  createdAt: string;
  /** Defaults to a hash of the game id. */
  seed?: number;
  config?: Partial<GameConfig>;
}

function checkSetup(setup: GameSetup): void {
  const ids = new Set<string>();
  for (const p of setup.players) {
    if (ids.has(p.id)) throw new Error(`Duplicate player id: ${p.id}`);
    ids.add(p.id);
  }
  for (const p of setup.players) {
    for (const ally of p.allies ?? []) {
      if (!ids.has(ally)) throw new Error(`Player ${p.id} lists unknown ally ${ally}`);
    }
    const system = getSystem(setup.topology, p.home.systemId);
    if (!system) throw new Error(`Player ${p.id} starts in unknown system ${p.home.systemId}`);
    if (!isWithinRadius(p.home.sector, system.radius)) {
      throw new Error(`Player ${p.id} starts outside ${system.id}`);
    }
  }
}

export function initializeGameState(setup: GameSetup): GameState {
  checkSetup(setup);
  const { ruleset, topology } = setup;
  const seed = setup.seed ?? generateGameSeed(setup.gameId);

  const players: Player[] = setup.players.map((p) => ({
    id: p.id,
    name: p.name,
    color: p.color,
    isHuman: p.isHuman,
    allies: [...(p.allies ?? [])],
    resources: { ...ruleset.economy.startingResources },
  }));

  const bodies: Record<string, BodyState> = {};
  for (const p of setup.players) {
    if (!p.homeBodyId) continue;
    const found = findBody(topology, p.homeBodyId);
    if (!found || !isColonizable(found.body)) {
      throw new Error(`Player ${p.id} has an invalid home body ${p.homeBodyId}`);
    }
    if (bodies[p.homeBodyId]) throw new Error(`Home body ${p.homeBodyId} is shared`);
    const capacity = getBodyClass(ruleset, found.body)?.capacity ?? 0;
    bodies[p.homeBodyId] = {
      owner: p.id,
      population: Math.min(capacity, ruleset.economy.homeworldPopulation),
      extractor: false,
    };
  }

  // Starting fleets, player by player in template order
  const units: Unit[] = [];
  let seq = 1;
  for (const p of setup.players) {
    for (const templateId of ruleset.startingFleet) {
      const template = getUnitTemplate(ruleset, templateId);
      units.push(
        createUnit(
          ruleset,
          template,
          p.id,
          { systemId: p.home.systemId, sector: p.home.sector, offset: p.home.offset ?? SECTOR_CENTER },
          seq,
        ),
      );
      seq++;
    }
  }

  return {
    gameId: setup.gameId,
    rulesetId: ruleset.id,
    turn: 1,
    topology,
    players,
    units,
    bodies,
    inhibition: [],
    nextUnitSeq: seq,
    nextOrderSeq: 1,
    rngSeed: seed,
    rngState: seed,
    config: { ...ruleset.defaults, ...setup.config },
    createdAt: setup.createdAt,
    lastResolvedAt: null,
  };
}
