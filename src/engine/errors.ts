// Engine invariants — checked after every turn resolution.
// A violation is a programming error, never a gameplay outcome.

import type { GameState } from '@/engine/types';
import type { RulesetPackage } from '@/rules/schema';
import { hexEquals, hexKey, isWithinRadius } from '@/engine/hex';
import { isInsideSector } from '@/engine/sector';
import { findBody, getSystem } from '@/engine/topology';
import { getInhibitor, usedCapacity } from '@/engine/units';

export class StateInvariantViolation extends Error {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`State invariant violated: ${violations.slice(0, 5).join('; ')}`);
    this.name = 'StateInvariantViolation';
    this.violations = violations;
  }
}

export function findInvariantViolations(state: GameState, ruleset: RulesetPackage): string[] {
  const violations: string[] = [];

  for (const player of state.players) {
    const { credits, metal, crystal } = player.resources;
    if (credits < 0 || metal < 0 || crystal < 0) {
      violations.push(`player ${player.id}: negative resources`);
    }
  }

  for (const unit of state.units) {
    const system = getSystem(state.topology, unit.position.systemId);
    if (!system) {
      violations.push(`unit ${unit.id}: unknown system ${unit.position.systemId}`);
    } else if (!isWithinRadius(unit.position.sector, system.radius)) {
      violations.push(`unit ${unit.id}: sector ${hexKey(unit.position.sector)} outside ${system.id}`);
    }
    if (!isInsideSector(unit.position.offset, state.config.sectorRadius)) {
      violations.push(`unit ${unit.id}: offset outside sector`);
    }
    const capacity = ruleset.hullClasses[unit.hull].capacity;
    if (usedCapacity(unit.components) > capacity) {
      violations.push(`unit ${unit.id}: hull capacity exceeded`);
    }
  }

  for (const field of state.inhibition) {
    const unit = state.units.find((u) => u.id === field.unitId);
    if (!unit) {
      violations.push(`inhibition field of ${field.unitId}: owning unit is gone`);
      continue;
    }
    if (!getInhibitor(unit)?.active) {
      violations.push(`inhibition field of ${unit.id}: inhibitor is off`);
    }
    if (unit.position.systemId !== field.systemId || !hexEquals(unit.position.sector, field.sector)) {
      violations.push(`inhibition field of ${unit.id}: not at the unit's sector`);
    }
  }

  for (const [bodyId, body] of Object.entries(state.bodies)) {
    if (body.population < 0) {
      violations.push(`body ${bodyId}: negative population`);
    }
    const located = findBody(state.topology, bodyId);
    const bodyClass = ruleset.bodyClasses.find((c) => c.id === located?.body.bodyClass);
    if (bodyClass && body.population > bodyClass.capacity) {
      violations.push(`body ${bodyId}: population ${body.population} above capacity ${bodyClass.capacity}`);
    }
  }

  return violations;
}

export function assertInvariants(state: GameState, ruleset: RulesetPackage): void {
  const violations = findInvariantViolations(state, ruleset);
  if (violations.length > 0) {
    throw new StateInvariantViolation(violations);
  }
}
