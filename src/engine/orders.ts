// OrderQueue — per-unit FIFO of orders, plus the submission boundary.
// Orders enter a queue only through submitOrder; the turn resolver drains them.

import type { GameState, Order, OrderDraft, OrderError, Unit } from '@/engine/types';
import type { RulesetPackage } from '@/rules/schema';
import { orderDraftSchema } from '@/lib/order-schema';
import { validateOrder } from '@/engine/order-execution';
import { getUnit, replaceUnit } from '@/engine/units';

// ---------------------------------------------------------------------------
// Queue primitives
// ---------------------------------------------------------------------------

export function enqueue(unit: Unit, order: Order): Unit {
  return { ...unit, orders: [...unit.orders, order] };
}

export function peekNext(unit: Unit): Order | undefined {
  return unit.orders[0];
}

/** Drops the head order after it completed or failed. */
export function popExecuted(unit: Unit): Unit {
  if (unit.orders.length === 0) return unit;
  return { ...unit, orders: unit.orders.slice(1) };
}

/** Swaps the head order for an updated copy carrying new progress. */
export function replaceHead(unit: Unit, order: Order): Unit {
  if (unit.orders.length === 0) return unit;
  return { ...unit, orders: [order, ...unit.orders.slice(1)] };
}

export function clearOrders(unit: Unit): Unit {
  return unit.orders.length === 0 ? unit : { ...unit, orders: [] };
}

export function validate(
  state: GameState,
  ruleset: RulesetPackage,
  unit: Unit,
  order: Order,
): { ok: true } | { ok: false; error: OrderError } {
  const error = validateOrder(state, ruleset, unit, order);
  return error ? { ok: false, error } : { ok: true };
}

// ---------------------------------------------------------------------------
// Submission & cancellation
// ---------------------------------------------------------------------------

export type SubmissionError =
  | { code: 'unknown_unit'; unitId: string }
  | { code: 'not_owner'; unitId: string; playerId: string }
  | { code: 'malformed_order'; detail: string }
  | { code: 'queue_full'; limit: number }
  | { code: 'unknown_order'; orderId: string };

export type SubmitResult =
  | { ok: true; state: GameState; order: Order }
  | { ok: false; error: SubmissionError };

export type CancelResult =
  | { ok: true; state: GameState }
  | { ok: false; error: SubmissionError };

function ownedUnit(
  state: GameState,
  playerId: string,
  unitId: string,
): { ok: true; unit: Unit } | { ok: false; error: SubmissionError } {
  const unit = getUnit(state, unitId);
  if (!unit) return { ok: false, error: { code: 'unknown_unit', unitId } };
  if (unit.owner !== playerId) return { ok: false, error: { code: 'not_owner', unitId, playerId } };
  return { ok: true, unit };
}

/**
 * Appends an order to one of the player's units. The draft is parsed before
 * it gets an id; target legality is checked when the order executes.
 */
export function submitOrder(
  state: GameState,
  playerId: string,
  unitId: string,
  draft: unknown,
): SubmitResult {
  const owned = ownedUnit(state, playerId, unitId);
  if (!owned.ok) return owned;

  const parsed = orderDraftSchema.safeParse(draft);
  if (!parsed.success) {
    const detail = parsed.error.issues.slice(0, 5)
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    return { ok: false, error: { code: 'malformed_order', detail } };
  }

  if (owned.unit.orders.length >= state.config.maxQueueLength) {
    return { ok: false, error: { code: 'queue_full', limit: state.config.maxQueueLength } };
  }

  const body: OrderDraft = parsed.data;
  const order: Order = { ...body, id: `ord-${state.nextOrderSeq}` };
  const next = replaceUnit(state, enqueue(owned.unit, order));
  return { ok: true, state: { ...next, nextOrderSeq: state.nextOrderSeq + 1 }, order };
}

export function cancelOrder(
  state: GameState,
  playerId: string,
  unitId: string,
  orderId: string,
): CancelResult {
  const owned = ownedUnit(state, playerId, unitId);
  if (!owned.ok) return owned;
  const { unit } = owned;
  if (!unit.orders.some((o) => o.id === orderId)) {
    return { ok: false, error: { code: 'unknown_order', orderId } };
  }
  return {
    ok: true,
    state: replaceUnit(state, { ...unit, orders: unit.orders.filter((o) => o.id !== orderId) }),
  };
}

export function cancelAllOrders(state: GameState, playerId: string, unitId: string): CancelResult {
  const owned = ownedUnit(state, playerId, unitId);
  if (!owned.ok) return owned;
  return { ok: true, state: replaceUnit(state, clearOrders(owned.unit)) };
}
