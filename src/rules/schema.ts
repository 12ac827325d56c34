// Ruleset package TypeScript interface — defines the shape of a ruleset.json file.
// Static game data only; everything that changes during play lives in GameState.

import type {
  ColonizableKind,
  GameConfig,
  HullClass,
  ResourceBalance,
  TurretSpec,
} from '@/engine/types';

// ---------------------------------------------------------------------------
// Hulls
// ---------------------------------------------------------------------------

export interface HullClassDefinition {
  /** Total component size the hull can carry. */
  capacity: number;
  hitPoints: number;
}

// ---------------------------------------------------------------------------
// Colonizable bodies
// ---------------------------------------------------------------------------

export interface BodyClassDefinition {
  id: string;
  name: string;
  kind: ColonizableKind;
  /** Logistic growth rate per turn. */
  growthRate: number;
  capacity: number;
  metalYield: number;
  crystalYield: number;
}

// ---------------------------------------------------------------------------
// Component templates (runtime state such as cooldowns is added on creation)
// ---------------------------------------------------------------------------

export type ComponentTemplate =
  | { kind: 'engine'; size: number; speed: number }
  | {
      kind: 'hyperdrive_basic' | 'hyperdrive_advanced';
      size: number;
      cooldown: number;
      jumpRange: number;
    }
  | { kind: 'weapon'; size: number; turret: TurretSpec }
  | { kind: 'inhibitor'; size: number; radius: number }
  | { kind: 'colony'; size: number; maxCargo: number; cargo: number }
  | { kind: 'constructor'; size: number; buildable: string[] };

export interface UnitTemplate {
  id: string;
  name: string;
  hull: HullClass;
  components: ComponentTemplate[];
}

// ---------------------------------------------------------------------------
// Structures built by constructors
// ---------------------------------------------------------------------------

export type StructureDefinition =
  | {
      kind: 'unit';
      id: string;
      name: string;
      cost: ResourceBalance;
      buildTurns: number;
      unitTemplateId: string;
    }
  | {
      kind: 'extractor';
      id: string;
      name: string;
      cost: ResourceBalance;
      buildTurns: number;
      allowedBodyKinds: ColonizableKind[];
    };

// ---------------------------------------------------------------------------
// Economy
// ---------------------------------------------------------------------------

export interface EconomyRules {
  /** Credits collected per unit of population each turn. */
  taxRate: number;
  startingResources: ResourceBalance;
  /** Population placed on a player's home body; clamped to its capacity. */
  homeworldPopulation: number;
}

// ---------------------------------------------------------------------------
// Top-level package
// ---------------------------------------------------------------------------

export interface RulesetPackage {
  id: string;
  name: string;
  description: string;
  hullClasses: Record<HullClass, HullClassDefinition>;
  bodyClasses: BodyClassDefinition[];
  unitTemplates: UnitTemplate[];
  structures: StructureDefinition[];
  /** Unit template ids every player starts with, in spawn order. */
  startingFleet: string[];
  economy: EconomyRules;
  defaults: GameConfig;
}
