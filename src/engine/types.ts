// All type definitions for the turn processing and navigation engine.

// ---------------------------------------------------------------------------
// PRNG (interface only; implementation in prng.ts)
// ---------------------------------------------------------------------------

export interface PRNG {
  /** Uniform float in [0, 1). */
  next(): number;
  nextInt(min: number, max: number): number;
  readonly state: number;
}

// ---------------------------------------------------------------------------
// Spatial primitives
// ---------------------------------------------------------------------------

/** Axial hex coordinate of a sector within a star system. */
export interface HexCoord {
  q: number;
  r: number;
}

/** Continuous position inside a sector, relative to the sector centre. */
export interface SectorOffset {
  x: number;
  y: number;
}

export interface UnitPosition {
  systemId: string;
  sector: HexCoord;
  offset: SectorOffset;
}

// ---------------------------------------------------------------------------
// Topology (read-only, produced by an external generator)
// ---------------------------------------------------------------------------

export type CelestialKind =
  | 'star'
  | 'planet'
  | 'moon'
  | 'asteroid'
  | 'wormhole_mouth'
  | 'nebula'
  | 'storm'
  | 'comet'
  | 'debris_field'
  | 'asteroid_field'
  | 'ice_field';

export type ColonizableKind = 'planet' | 'moon' | 'asteroid';

export interface CelestialObject {
  id: string;
  name: string;
  kind: CelestialKind;
  sector: HexCoord;
  offset: SectorOffset;
  /** Ruleset body class id; present on colonizable bodies only. */
  bodyClass: string | null;
}

export interface StarSystem {
  id: string;
  name: string;
  radius: number;
  bodies: CelestialObject[];
}

export interface WormholeEndpoint {
  systemId: string;
  /** Sector of the wormhole mouth — the entry point for jumps into this system. */
  sector: HexCoord;
}

export interface Wormhole {
  id: string;
  a: WormholeEndpoint;
  b: WormholeEndpoint;
  cost: number;
}

export interface Topology {
  id: string;
  systems: StarSystem[];
  wormholes: Wormhole[];
  disconnected: boolean;
}

// ---------------------------------------------------------------------------
// Mutable annotations layered over topology
// ---------------------------------------------------------------------------

export interface BodyState {
  owner: string | null;
  population: number;
  extractor: boolean;
}

export interface InhibitionField {
  unitId: string;
  owner: string;
  systemId: string;
  sector: HexCoord;
}

// ---------------------------------------------------------------------------
// Players
// ---------------------------------------------------------------------------

export interface ResourceBalance {
  credits: number;
  metal: number;
  crystal: number;
}

export interface Player {
  id: string;
  name: string;
  color: string;
  isHuman: boolean;
  allies: string[];
  resources: ResourceBalance;
}

// ---------------------------------------------------------------------------
// Units & components
// ---------------------------------------------------------------------------

export type HullClass = 'tiny' | 'small' | 'medium' | 'large' | 'huge';

export type TurretType = 'mass_driver' | 'beam' | 'missile';

export interface TurretSpec {
  type: TurretType;
  damage: number;
  range: number;
  cooldown: number;
}

export interface ConstructionProject {
  structureId: string;
  bodyId: string | null;
  offset: SectorOffset;
  turnsRemaining: number;
}

export interface EngineComponent {
  kind: 'engine';
  size: number;
  speed: number;
}

export interface HyperdriveComponent {
  kind: 'hyperdrive_basic' | 'hyperdrive_advanced';
  size: number;
  cooldown: number;
  jumpRange: number;
  cooldownRemaining: number;
}

export interface WeaponComponent {
  kind: 'weapon';
  size: number;
  turret: TurretSpec;
  cooldownRemaining: number;
}

export interface InhibitorComponent {
  kind: 'inhibitor';
  size: number;
  radius: number;
  active: boolean;
}

export interface ColonyComponent {
  kind: 'colony';
  size: number;
  cargo: number;
  maxCargo: number;
}

export interface ConstructorComponent {
  kind: 'constructor';
  size: number;
  buildable: string[];
  project: ConstructionProject | null;
}

export type Component =
  | EngineComponent
  | HyperdriveComponent
  | WeaponComponent
  | InhibitorComponent
  | ColonyComponent
  | ConstructorComponent;

export type ComponentKind = Component['kind'];

export interface Unit {
  id: string;
  name: string;
  owner: string;
  hull: HullClass;
  components: Component[];
  position: UnitPosition;
  hullPoints: number;
  maxHullPoints: number;
  orders: Order[];
  createdSeq: number;
}

// ---------------------------------------------------------------------------
// Orders — discriminated union
// ---------------------------------------------------------------------------

export interface OrderProgress {
  /** Distance still to cover for sub-sector motion. */
  remaining?: number;
  /** Wormhole hops already taken towards the destination. */
  hops?: number;
}

interface OrderBase {
  id: string;
  progress?: OrderProgress;
}

export interface MoveOrder extends OrderBase {
  kind: 'move';
  target: SectorOffset;
}

export interface JumpHexOrder extends OrderBase {
  kind: 'jump_hex';
  target: HexCoord;
  arrival?: SectorOffset;
}

export interface JumpWormholeOrder extends OrderBase {
  kind: 'jump_wormhole';
  targetSystemId: string;
}

export interface ToggleInhibitorOrder extends OrderBase {
  kind: 'toggle_inhibitor';
  on: boolean;
}

export interface ColonizeOrder extends OrderBase {
  kind: 'colonize';
  bodyId: string;
}

export interface LoadColonistsOrder extends OrderBase {
  kind: 'load_colonists';
  bodyId: string;
  amount: number;
}

export interface ConstructOrder extends OrderBase {
  kind: 'construct';
  structureId: string;
  bodyId?: string;
  offset?: SectorOffset;
}

export interface AttackOrder extends OrderBase {
  kind: 'attack';
  targetUnitId: string;
}

export type Order =
  | MoveOrder
  | JumpHexOrder
  | JumpWormholeOrder
  | ToggleInhibitorOrder
  | ColonizeOrder
  | LoadColonistsOrder
  | ConstructOrder
  | AttackOrder;

export type OrderKind = Order['kind'];

/** An order as submitted from outside the engine, before an id is assigned. */
export type OrderDraft = DraftOf<Order>;

type DraftOf<O> = O extends unknown ? Omit<O, 'id' | 'progress'> : never;

// ---------------------------------------------------------------------------
// Errors surfaced through the turn report
// ---------------------------------------------------------------------------

export type ValidationError =
  | { code: 'missing_component'; component: ComponentKind }
  | { code: 'inhibited'; systemId: string; sector: HexCoord }
  | { code: 'illegal_target'; detail: string }
  | { code: 'insufficient_resources'; required: ResourceBalance; available: ResourceBalance };

export type PathfindingError =
  | { code: 'no_path'; detail: string }
  | { code: 'search_budget_exceeded'; explored: number; budget: number };

export type OrderError = ValidationError | PathfindingError;

/** Not an error: the order waits at the head of the queue for a drive or turret. */
export interface CooldownBlock {
  code: 'cooldown';
  turnsRemaining: number;
}

// ---------------------------------------------------------------------------
// Turn report
// ---------------------------------------------------------------------------

export type OrderOutcome = 'completed' | 'in_progress' | 'blocked' | 'failed';

export interface TurnReportEntry {
  unitId: string;
  playerId: string;
  order: Order;
  outcome: OrderOutcome;
  reason?: OrderError | CooldownBlock;
}

export interface ResourceDelta {
  credits: number;
  metal: number;
  crystal: number;
  population: number;
}

export interface TurnReport {
  turnNumber: number;
  resolvedAt: string;
  entries: TurnReportEntry[];
  resourceDeltas: Record<string, ResourceDelta>;
  createdUnits: string[];
  destroyedUnits: string[];
}

// ---------------------------------------------------------------------------
// Game state
// ---------------------------------------------------------------------------

export interface GameConfig {
  /** Maximum graph nodes a wormhole route search may settle. */
  searchNodeBudget: number;
  /** Radius of the continuous sector circle, in logical units. */
  sectorRadius: number;
  maxQueueLength: number;
  aiEnabled: boolean;
}

export interface GameState {
  gameId: string;
  rulesetId: string;
  turn: number;
  topology: Topology;
  players: Player[];
  units: Unit[];
  bodies: Record<string, BodyState>;
  inhibition: InhibitionField[];
  nextUnitSeq: number;
  nextOrderSeq: number;
  rngSeed: number;
  rngState: number;
  config: GameConfig;
  createdAt: string;
  lastResolvedAt: string | null;
}

// ---------------------------------------------------------------------------
// Pipeline types
// ---------------------------------------------------------------------------

export type ResolutionPhase = 'ai' | 'orders' | 'economy' | 'invariants' | 'summary';

export interface ResolutionLog {
  phase: ResolutionPhase;
  messages: string[];
}
