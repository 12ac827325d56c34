// Units & components — capability lookups, creation from templates, timers.
// Pure functions: units are never mutated in place.

import type {
  ColonyComponent,
  Component,
  ComponentKind,
  ConstructorComponent,
  EngineComponent,
  GameState,
  HyperdriveComponent,
  InhibitorComponent,
  Unit,
  UnitPosition,
  WeaponComponent,
} from '@/engine/types';
import type { ComponentTemplate, RulesetPackage, UnitTemplate } from '@/rules/schema';

// ---------------------------------------------------------------------------
// Capability lookups
// ---------------------------------------------------------------------------

export function hasComponent(unit: Unit, kind: ComponentKind): boolean {
  return unit.components.some((c) => c.kind === kind);
}

export function getHyperdrive(
  unit: Unit,
  kind: HyperdriveComponent['kind'],
): HyperdriveComponent | undefined {
  for (const c of unit.components) {
    if ((c.kind === 'hyperdrive_basic' || c.kind === 'hyperdrive_advanced') && c.kind === kind) return c;
  }
  return undefined;
}

/** Drive used for hex jumps: a basic hyperdrive when fitted, else an advanced one. */
export function hexJumpDrive(unit: Unit): HyperdriveComponent | undefined {
  return getHyperdrive(unit, 'hyperdrive_basic') ?? getHyperdrive(unit, 'hyperdrive_advanced');
}

export function getInhibitor(unit: Unit): InhibitorComponent | undefined {
  for (const c of unit.components) {
    if (c.kind === 'inhibitor') return c;
  }
  return undefined;
}

export function getColonyPod(unit: Unit): ColonyComponent | undefined {
  for (const c of unit.components) {
    if (c.kind === 'colony') return c;
  }
  return undefined;
}

export function getConstructor(unit: Unit): ConstructorComponent | undefined {
  for (const c of unit.components) {
    if (c.kind === 'constructor') return c;
  }
  return undefined;
}

export function getWeapons(unit: Unit): WeaponComponent[] {
  const weapons: WeaponComponent[] = [];
  for (const c of unit.components) {
    if (c.kind === 'weapon') weapons.push(c);
  }
  return weapons;
}

export function fastestEngine(unit: Unit): EngineComponent | undefined {
  let best: EngineComponent | undefined;
  for (const c of unit.components) {
    if (c.kind === 'engine' && (!best || c.speed > best.speed)) best = c;
  }
  return best;
}

export function usedCapacity(components: ReadonlyArray<{ size: number }>): number {
  return components.reduce((sum, c) => sum + c.size, 0);
}

// ---------------------------------------------------------------------------
// Component updates
// ---------------------------------------------------------------------------

/** Replaces `target` (matched by identity) with `update(target)`. */
export function updateComponent<C extends Component>(
  unit: Unit,
  target: C,
  update: (component: C) => C,
): Unit {
  const index = unit.components.indexOf(target);
  if (index === -1) return unit;
  const components = [...unit.components];
  components[index] = update(target);
  return { ...unit, components };
}

/** Decrements hyperdrive and turret cooldowns by one turn. */
export function tickCooldowns(unit: Unit): Unit {
  let changed = false;
  const components = unit.components.map((c): Component => {
    switch (c.kind) {
      case 'hyperdrive_basic':
      case 'hyperdrive_advanced':
      case 'weapon':
        if (c.cooldownRemaining <= 0) return c;
        changed = true;
        return { ...c, cooldownRemaining: c.cooldownRemaining - 1 };
      default:
        return c;
    }
  });
  return changed ? { ...unit, components } : unit;
}

// ---------------------------------------------------------------------------
// Creation
// ---------------------------------------------------------------------------

function instantiate(template: ComponentTemplate): Component {
  switch (template.kind) {
    case 'engine':
      return { ...template };
    case 'hyperdrive_basic':
    case 'hyperdrive_advanced':
      return { ...template, cooldownRemaining: 0 };
    case 'weapon':
      return { ...template, turret: { ...template.turret }, cooldownRemaining: 0 };
    case 'inhibitor':
      return { ...template, active: false };
    case 'colony':
      return { ...template };
    case 'constructor':
      return { ...template, buildable: [...template.buildable], project: null };
  }
}

export function getUnitTemplate(ruleset: RulesetPackage, templateId: string): UnitTemplate {
  const template = ruleset.unitTemplates.find((t) => t.id === templateId);
  if (!template) {
    throw new Error(`Unknown unit template: ${templateId}`);
  }
  return template;
}

/**
 * Builds a unit from a ruleset template. Throws if the template's components
 * exceed its hull capacity.
 */
export function createUnit(
  ruleset: RulesetPackage,
  template: UnitTemplate,
  owner: string,
  position: UnitPosition,
  seq: number,
): Unit {
  const hull = ruleset.hullClasses[template.hull];
  const used = usedCapacity(template.components);
  if (used > hull.capacity) {
    throw new Error(
      `Template ${template.id} needs ${used} hull capacity but ${template.hull} holds ${hull.capacity}`,
    );
  }

  return {
    id: `unit-${seq}`,
    name: `${template.name} ${seq}`,
    owner,
    hull: template.hull,
    components: template.components.map(instantiate),
    position: {
      systemId: position.systemId,
      sector: { ...position.sector },
      offset: { ...position.offset },
    },
    hullPoints: hull.hitPoints,
    maxHullPoints: hull.hitPoints,
    orders: [],
    createdSeq: seq,
  };
}

// ---------------------------------------------------------------------------
// State helpers
// ---------------------------------------------------------------------------

export function getUnit(state: GameState, unitId: string): Unit | undefined {
  return state.units.find((u) => u.id === unitId);
}

export function replaceUnit(state: GameState, unit: Unit): GameState {
  return {
    ...state,
    units: state.units.map((u) => (u.id === unit.id ? unit : u)),
  };
}

export function isIdle(unit: Unit): boolean {
  return unit.orders.length === 0;
}
