// ResourceLedger — per-player yield, taxes and population growth.
// Runs once per player per turn, after that player's units have acted.
// All functions are pure: no side effects, no async, no randomness.

import type {
  BodyState,
  CelestialObject,
  GameState,
  Player,
  ResourceBalance,
  ResourceDelta,
} from '@/engine/types';
import type { BodyClassDefinition, RulesetPackage } from '@/rules/schema';
import { isColonizable } from '@/engine/topology';

// ---------------------------------------------------------------------------
// Resource arithmetic
// ---------------------------------------------------------------------------

export function canAfford(available: ResourceBalance, cost: ResourceBalance): boolean {
  return (
    available.credits >= cost.credits &&
    available.metal >= cost.metal &&
    available.crystal >= cost.crystal
  );
}

/** Subtracts `cost`, flooring each balance at zero. */
export function spendResources(available: ResourceBalance, cost: ResourceBalance): ResourceBalance {
  return {
    credits: Math.max(0, available.credits - cost.credits),
    metal: Math.max(0, available.metal - cost.metal),
    crystal: Math.max(0, available.crystal - cost.crystal),
  };
}

export function getPlayer(state: GameState, playerId: string): Player | undefined {
  return state.players.find((p) => p.id === playerId);
}

export function updatePlayer(state: GameState, player: Player): GameState {
  return {
    ...state,
    players: state.players.map((p) => (p.id === player.id ? player : p)),
  };
}

// ---------------------------------------------------------------------------
// Body lookups
// ---------------------------------------------------------------------------

export function getBodyClass(
  ruleset: RulesetPackage,
  body: CelestialObject,
): BodyClassDefinition | undefined {
  if (body.bodyClass === null) return undefined;
  return ruleset.bodyClasses.find((c) => c.id === body.bodyClass);
}

export function getBodyState(state: GameState, bodyId: string): BodyState {
  return state.bodies[bodyId] ?? { owner: null, population: 0, extractor: false };
}

// ---------------------------------------------------------------------------
// Growth
// ---------------------------------------------------------------------------

/**
 * Logistic growth: pop + round(pop × rate × (1 − pop / capacity)),
 * clamped to [0, capacity].
 */
export function growPopulation(population: number, growthRate: number, capacity: number): number {
  if (capacity <= 0) return 0;
  const growth = Math.round(population * growthRate * (1 - population / capacity));
  return Math.max(0, Math.min(capacity, population + growth));
}

// ---------------------------------------------------------------------------
// Per-player turn yield
// ---------------------------------------------------------------------------

export function applyTurnYield(
  state: GameState,
  playerId: string,
  ruleset: RulesetPackage,
): { state: GameState; delta: ResourceDelta } {
  const delta: ResourceDelta = { credits: 0, metal: 0, crystal: 0, population: 0 };
  const player = getPlayer(state, playerId);
  if (!player) return { state, delta };

  // Accumulate yields as floats; floor on application.
  let credits = 0;
  let metal = 0;
  let crystal = 0;
  const bodies: Record<string, BodyState> = { ...state.bodies };

  for (const system of state.topology.systems) {
    for (const body of system.bodies) {
      const current = state.bodies[body.id];
      if (!current || current.owner !== playerId || !isColonizable(body)) continue;
      const bodyClass = getBodyClass(ruleset, body);
      if (!bodyClass) continue;

      // Extraction needs an extractor or a resident population
      if (current.extractor || current.population > 0) {
        metal += bodyClass.metalYield;
        crystal += bodyClass.crystalYield;
      }
      credits += current.population * ruleset.economy.taxRate;

      const population = growPopulation(current.population, bodyClass.growthRate, bodyClass.capacity);
      if (population !== current.population) {
        delta.population += population - current.population;
        bodies[body.id] = { ...current, population };
      }
    }
  }

  delta.credits = Math.floor(credits);
  delta.metal = Math.floor(metal);
  delta.crystal = Math.floor(crystal);

  const resources: ResourceBalance = {
    credits: Math.max(0, player.resources.credits + delta.credits),
    metal: Math.max(0, player.resources.metal + delta.metal),
    crystal: Math.max(0, player.resources.crystal + delta.crystal),
  };

  return {
    state: updatePlayer({ ...state, bodies }, { ...player, resources }),
    delta,
  };
}
