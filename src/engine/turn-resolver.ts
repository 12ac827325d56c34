// Turn resolution pipeline — one End Turn step over an immutable GameState.
// AI pre-pass, then every player's units in creation order, then that
// player's economy; finally the turn counter advances and invariants are checked.
// Pure function: accepts resolvedAt instead of reading the clock.

import type {
  GameState,
  Order,
  OrderError,
  CooldownBlock,
  PRNG,
  ResolutionLog,
  ResolutionPhase,
  ResourceDelta,
  TurnReport,
  TurnReportEntry,
} from '@/engine/types';
import type { RulesetPackage } from '@/rules/schema';
import { createPRNG } from '@/engine/prng';
import { planAIOrders } from '@/engine/ai-governor';
import { applyTurnYield } from '@/engine/economy';
import { advanceConstruction, executeOrder, validateOrder } from '@/engine/order-execution';
import { peekNext, popExecuted, replaceHead, submitOrder } from '@/engine/orders';
import { getUnit, replaceUnit, tickCooldowns } from '@/engine/units';
import { assertInvariants } from '@/engine/errors';
import { hexKey } from '@/engine/hex';

export interface TurnResolutionResult {
  state: GameState;
  report: TurnReport;
  logs: ResolutionLog[];
}

// ---------------------------------------------------------------------------
// Log helpers
// ---------------------------------------------------------------------------

function logPhase(phase: ResolutionPhase, messages: string[]): ResolutionLog {
  return { phase, messages };
}

export function describeReason(reason: OrderError | CooldownBlock): string {
  switch (reason.code) {
    case 'missing_component':
      return `missing component ${reason.component}`;
    case 'inhibited':
      return `inhibited at ${reason.systemId} ${hexKey(reason.sector)}`;
    case 'illegal_target':
      return `illegal target: ${reason.detail}`;
    case 'insufficient_resources':
      return 'insufficient resources';
    case 'no_path':
      return `no path: ${reason.detail}`;
    case 'search_budget_exceeded':
      return `search budget exceeded after ${reason.explored} of ${reason.budget} systems`;
    case 'cooldown':
      return `cooling down, ${reason.turnsRemaining} turn(s) left`;
  }
}

// ---------------------------------------------------------------------------
// AI pre-pass
// ---------------------------------------------------------------------------

function resolveAIOrders(
  state: GameState,
  ruleset: RulesetPackage,
  prng: PRNG,
): { state: GameState; log: ResolutionLog } {
  let s = state;
  const messages: string[] = [];

  for (const player of state.players) {
    if (player.isHuman) continue;
    for (const { unitId, order } of planAIOrders(s, player.id, ruleset, prng)) {
      const submitted = submitOrder(s, player.id, unitId, order);
      if (submitted.ok) {
        s = submitted.state;
        messages.push(`${player.id}: ${unitId} queued ${order.kind}`);
      } else {
        messages.push(`${player.id}: ${unitId} ${order.kind} rejected (${submitted.error.code})`);
      }
    }
  }

  return { state: s, log: logPhase('ai', messages) };
}

// ---------------------------------------------------------------------------
// Per-unit step
// ---------------------------------------------------------------------------

interface UnitStepResult {
  state: GameState;
  entry: TurnReportEntry | null;
  created: string[];
  destroyed: string[];
  messages: string[];
}

/** Ticks the unit's timers, then attempts exactly one step of its head order. */
function resolveUnitStep(
  state: GameState,
  ruleset: RulesetPackage,
  unitId: string,
): UnitStepResult {
  const existing = getUnit(state, unitId);
  if (!existing) {
    return { state, entry: null, created: [], destroyed: [], messages: [] };
  }

  const built = advanceConstruction(replaceUnit(state, tickCooldowns(existing)), ruleset, unitId);
  let s = built.state;
  const messages = [...built.messages];

  const unit = getUnit(s, unitId);
  const order: Order | undefined = unit ? peekNext(unit) : undefined;
  if (!unit || !order) {
    return { state: s, entry: null, created: built.created, destroyed: [], messages };
  }

  const invalid = validateOrder(s, ruleset, unit, order);
  if (invalid) {
    messages.push(`${unit.id} ${order.kind} ${order.id} failed: ${describeReason(invalid)}`);
    return {
      state: replaceUnit(s, popExecuted(unit)),
      entry: { unitId, playerId: unit.owner, order, outcome: 'failed', reason: invalid },
      created: built.created,
      destroyed: [],
      messages,
    };
  }

  const result = executeOrder(s, ruleset, unit, order);
  s = result.state;
  messages.push(...result.messages);
  if (result.reason) {
    messages.push(`${unit.id} ${order.kind} ${order.id} ${result.outcome}: ${describeReason(result.reason)}`);
  }

  const after = getUnit(s, unitId);
  if (after) {
    switch (result.outcome) {
      case 'completed':
      case 'failed':
        s = replaceUnit(s, popExecuted(after));
        break;
      case 'in_progress':
        s = replaceUnit(s, replaceHead(after, result.order ?? order));
        break;
      case 'blocked':
        break;
    }
  }

  const entry: TurnReportEntry = { unitId, playerId: unit.owner, order, outcome: result.outcome };
  if (result.reason) entry.reason = result.reason;

  return { state: s, entry, created: built.created, destroyed: result.destroyed, messages };
}

// ---------------------------------------------------------------------------
// Main pipeline
// ---------------------------------------------------------------------------

export function endTurn(
  state: GameState,
  ruleset: RulesetPackage,
  resolvedAt: string,
): TurnResolutionResult {
  const logs: ResolutionLog[] = [];
  const prng = createPRNG(state.rngState);
  let s = state;

  if (s.config.aiEnabled) {
    const ai = resolveAIOrders(s, ruleset, prng);
    s = ai.state;
    logs.push(ai.log);
  }

  // Units created during this turn wait until the next one
  const roster = new Set(s.units.map((u) => u.id));
  const entries: TurnReportEntry[] = [];
  const createdUnits: string[] = [];
  const destroyedUnits: string[] = [];
  const resourceDeltas: Record<string, ResourceDelta> = {};
  const orderMessages: string[] = [];
  const economyMessages: string[] = [];

  for (const player of state.players) {
    const unitIds = s.units
      .filter((u) => u.owner === player.id && roster.has(u.id))
      .sort((a, b) => a.createdSeq - b.createdSeq)
      .map((u) => u.id);

    for (const unitId of unitIds) {
      const step = resolveUnitStep(s, ruleset, unitId);
      s = step.state;
      if (step.entry) entries.push(step.entry);
      createdUnits.push(...step.created);
      destroyedUnits.push(...step.destroyed);
      orderMessages.push(...step.messages);
    }

    const yielded = applyTurnYield(s, player.id, ruleset);
    s = yielded.state;
    resourceDeltas[player.id] = yielded.delta;
    const d = yielded.delta;
    economyMessages.push(
      `${player.id}: +${d.credits} credits, +${d.metal} metal, +${d.crystal} crystal, population ${d.population >= 0 ? '+' : ''}${d.population}`,
    );
  }

  logs.push(logPhase('orders', orderMessages));
  logs.push(logPhase('economy', economyMessages));

  const resolved: GameState = {
    ...s,
    turn: s.turn + 1,
    rngState: prng.state,
    lastResolvedAt: resolvedAt,
  };

  assertInvariants(resolved, ruleset);
  logs.push(logPhase('invariants', [`${resolved.units.length} units, ${resolved.inhibition.length} inhibition fields checked`]));

  const report: TurnReport = {
    turnNumber: state.turn,
    resolvedAt,
    entries,
    resourceDeltas,
    createdUnits,
    destroyedUnits,
  };

  const count = (outcome: TurnReportEntry['outcome']): number =>
    entries.filter((e) => e.outcome === outcome).length;
  logs.push(
    logPhase('summary', [
      `Turn ${state.turn} resolved: ${count('completed')} completed, ${count('in_progress')} in progress, ` +
        `${count('blocked')} blocked, ${count('failed')} failed`,
    ]),
  );

  return { state: resolved, report, logs };
}
