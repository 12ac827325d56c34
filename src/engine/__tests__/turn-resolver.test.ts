import { describe, it, expect } from 'vitest';
import { endTurn } from '@/engine/turn-resolver';
import { StateInvariantViolation } from '@/engine/errors';
import { getHyperdrive, getUnit } from '@/engine/units';
import type { GameState, Order, Unit } from '@/engine/types';
import {
  advancedDrive,
  basicDrive,
  fieldOf,
  inhibitor,
  makeMinimalGameState,
  makePlayer,
  makeRuleset,
  makeUnit,
  weapon,
} from './fixtures';

const ruleset = makeRuleset();
const resolvedAt = '2026-01-02T00:00:00.000Z';

function unitIn(state: GameState, id: string): Unit {
  const unit = getUnit(state, id);
  if (!unit) throw new Error(`unit ${id} missing`);
  return unit;
}

function withOrders(unit: Unit, ...orders: Order[]): Unit {
  return { ...unit, orders };
}

// ---------------------------------------------------------------------------
// Pipeline bookkeeping
// ---------------------------------------------------------------------------

describe('endTurn', () => {
  it('advances the turn counter and stamps the resolution time', () => {
    const state = makeMinimalGameState();
    const { state: next, report, logs } = endTurn(state, ruleset, resolvedAt);

    expect(next.turn).toBe(2);
    expect(next.lastResolvedAt).toBe(resolvedAt);
    expect(report.turnNumber).toBe(1);
    expect(report.resolvedAt).toBe(resolvedAt);
    expect(logs.map((l) => l.phase)).toEqual(['orders', 'economy', 'invariants', 'summary']);
    expect(logs[3].messages).toEqual(['Turn 1 resolved: 0 completed, 0 in progress, 0 blocked, 0 failed']);
  });

  it('does not mutate the input state', () => {
    const unit = withOrders(makeUnit('u1', 'p1', { components: [basicDrive()] }), {
      id: 'o1',
      kind: 'jump_hex',
      target: { q: 2, r: -1 },
    });
    const state = makeMinimalGameState({ units: [unit] });
    const before = JSON.stringify(state);
    endTurn(state, ruleset, resolvedAt);
    expect(JSON.stringify(state)).toBe(before);
  });

  it('reports a resource delta for every player', () => {
    const state = makeMinimalGameState({
      bodies: { 'alpha-1': { owner: 'p1', population: 50, extractor: false } },
    });
    const { report, logs } = endTurn(state, ruleset, resolvedAt);
    expect(report.resourceDeltas).toEqual({
      p1: { credits: 5, metal: 0, crystal: 0, population: 1 },
      p2: { credits: 0, metal: 0, crystal: 0, population: 0 },
    });
    expect(logs[1].messages[0]).toBe('p1: +5 credits, +0 metal, +0 crystal, population +1');
  });

  it('throws when the resolved state breaks an invariant', () => {
    const stray = makeUnit('u1', 'p1', {
      position: { systemId: 'alpha', sector: { q: 5, r: 0 }, offset: { x: 0, y: 0 } },
    });
    const state = makeMinimalGameState({ units: [stray] });
    expect(() => endTurn(state, ruleset, resolvedAt)).toThrow(StateInvariantViolation);
  });
});

// ---------------------------------------------------------------------------
// Order outcomes
// ---------------------------------------------------------------------------

describe('endTurn order outcomes', () => {
  it('fails a wormhole order for a unit with only a basic drive', () => {
    const unit = withOrders(makeUnit('u1', 'p1', { components: [basicDrive()] }), {
      id: 'o1',
      kind: 'jump_wormhole',
      targetSystemId: 'beta',
    });
    const { state, report } = endTurn(makeMinimalGameState({ units: [unit] }), ruleset, resolvedAt);

    expect(report.entries).toHaveLength(1);
    expect(report.entries[0].outcome).toBe('failed');
    expect(report.entries[0].reason).toEqual({ code: 'missing_component', component: 'hyperdrive_advanced' });
    const after = unitIn(state, 'u1');
    expect(after.position.systemId).toBe('alpha');
    expect(after.orders).toEqual([]);
  });

  it('completes a hex jump and starts the drive cooldown', () => {
    const unit = withOrders(makeUnit('u1', 'p1', { components: [basicDrive()] }), {
      id: 'o1',
      kind: 'jump_hex',
      target: { q: 2, r: -1 },
    });
    const { state, report } = endTurn(makeMinimalGameState({ units: [unit] }), ruleset, resolvedAt);

    expect(report.entries[0].outcome).toBe('completed');
    const after = unitIn(state, 'u1');
    expect(after.position.sector).toEqual({ q: 2, r: -1 });
    expect(getHyperdrive(after, 'hyperdrive_basic')?.cooldownRemaining).toBe(3);
    expect(after.orders).toEqual([]);
  });

  it('rejects a hex jump into a hostile inhibition field', () => {
    const mover = withOrders(makeUnit('u1', 'p1', { components: [basicDrive()] }), {
      id: 'o1',
      kind: 'jump_hex',
      target: { q: 2, r: -1 },
    });
    const picket = makeUnit('u2', 'p2', {
      components: [inhibitor(true)],
      position: { systemId: 'alpha', sector: { q: 2, r: -1 }, offset: { x: 0, y: 0 } },
    });
    const state = makeMinimalGameState({ units: [mover, picket], inhibition: [fieldOf(picket)] });
    const { state: next, report } = endTurn(state, ruleset, resolvedAt);

    expect(report.entries[0]).toEqual({
      unitId: 'u1',
      playerId: 'p1',
      order: { id: 'o1', kind: 'jump_hex', target: { q: 2, r: -1 } },
      outcome: 'failed',
      reason: { code: 'inhibited', systemId: 'alpha', sector: { q: 2, r: -1 } },
    });
    expect(unitIn(next, 'u1').position.sector).toEqual({ q: 0, r: 0 });
  });

  it('walks a wormhole route one hop per ready turn', () => {
    const unit = withOrders(makeUnit('u1', 'p1', { components: [advancedDrive(0, 2)] }), {
      id: 'o1',
      kind: 'jump_wormhole',
      targetSystemId: 'gamma',
    });

    const first = endTurn(makeMinimalGameState({ units: [unit] }), ruleset, resolvedAt);
    expect(first.report.entries[0].outcome).toBe('in_progress');
    const afterFirst = unitIn(first.state, 'u1');
    expect(afterFirst.position).toEqual({ systemId: 'beta', sector: { q: -1, r: 0 }, offset: { x: 0, y: 0 } });
    expect(afterFirst.orders[0].progress).toEqual({ hops: 1 });

    const second = endTurn(first.state, ruleset, resolvedAt);
    expect(second.report.entries[0].outcome).toBe('blocked');
    expect(second.report.entries[0].reason).toEqual({ code: 'cooldown', turnsRemaining: 1 });
    expect(unitIn(second.state, 'u1').orders).toHaveLength(1);

    const third = endTurn(second.state, ruleset, resolvedAt);
    expect(third.report.entries[0].outcome).toBe('completed');
    const arrived = unitIn(third.state, 'u1');
    expect(arrived.position).toEqual({ systemId: 'gamma', sector: { q: 0, r: -1 }, offset: { x: 0, y: 0 } });
    expect(arrived.orders).toEqual([]);
    expect(third.state.turn).toBe(4);
  });

  it('executes only the head order each turn', () => {
    const unit = withOrders(
      makeUnit('u1', 'p1', { components: [basicDrive(5, 0, 1)] }),
      { id: 'o1', kind: 'jump_hex', target: { q: 1, r: 0 } },
      { id: 'o2', kind: 'jump_hex', target: { q: 2, r: 0 } },
    );
    const { state, report } = endTurn(makeMinimalGameState({ units: [unit] }), ruleset, resolvedAt);
    expect(report.entries.map((e) => e.order.id)).toEqual(['o1']);
    expect(unitIn(state, 'u1').orders.map((o) => o.id)).toEqual(['o2']);
  });

  it('records destroyed units and skips them for the rest of the turn', () => {
    const attacker = withOrders(makeUnit('u1', 'p1', { components: [weapon(10)] }), {
      id: 'o1',
      kind: 'attack',
      targetUnitId: 'u2',
    });
    const victim = withOrders(makeUnit('u2', 'p2', { hullPoints: 5, components: [basicDrive()] }), {
      id: 'o2',
      kind: 'jump_hex',
      target: { q: 1, r: 0 },
    });
    const { state, report } = endTurn(makeMinimalGameState({ units: [attacker, victim] }), ruleset, resolvedAt);

    expect(report.destroyedUnits).toEqual(['u2']);
    expect(report.entries.map((e) => e.unitId)).toEqual(['u1']);
    expect(getUnit(state, 'u2')).toBeUndefined();
  });

  it('finishes construction at the start of the builder step', () => {
    const builder = makeUnit('u1', 'p1', {
      components: [
        {
          kind: 'constructor',
          size: 15,
          buildable: ['station_mk1'],
          project: { structureId: 'station_mk1', bodyId: null, offset: { x: 0, y: 0 }, turnsRemaining: 1 },
        },
      ],
    });
    const { state, report } = endTurn(makeMinimalGameState({ units: [builder] }), ruleset, resolvedAt);

    expect(report.createdUnits).toEqual(['unit-100']);
    expect(state.nextUnitSeq).toBe(101);
    expect(unitIn(state, 'unit-100').createdSeq).toBe(100);
  });
});

// ---------------------------------------------------------------------------
// AI pre-pass
// ---------------------------------------------------------------------------

describe('endTurn AI pre-pass', () => {
  function aiState(): GameState {
    return makeMinimalGameState({
      players: [makePlayer('p1'), makePlayer('p2', { isHuman: false })],
      units: [
        makeUnit('u1', 'p1', {
          position: { systemId: 'alpha', sector: { q: 0, r: 0 }, offset: { x: 100, y: 0 } },
        }),
        makeUnit('u2', 'p2', { components: [weapon(10)], createdSeq: 1 }),
      ],
      config: { searchNodeBudget: 64, sectorRadius: 1000, maxQueueLength: 4, aiEnabled: true },
    });
  }

  it('queues and executes orders for computer players', () => {
    const { state, report, logs } = endTurn(aiState(), ruleset, resolvedAt);

    expect(logs[0]).toEqual({ phase: 'ai', messages: ['p2: u2 queued attack'] });
    expect(report.entries).toEqual([
      {
        unitId: 'u2',
        playerId: 'p2',
        order: { id: 'ord-1', kind: 'attack', targetUnitId: 'u1' },
        outcome: 'in_progress',
      },
    ]);
    expect(unitIn(state, 'u1').hullPoints).toBe(90);
    expect(state.nextOrderSeq).toBe(2);
    expect(state.rngState).toBe(42);
  });

  it('skips the AI when disabled', () => {
    const disabled = {
      ...aiState(),
      config: { searchNodeBudget: 64, sectorRadius: 1000, maxQueueLength: 4, aiEnabled: false },
    };
    const { report, logs } = endTurn(disabled, ruleset, resolvedAt);
    expect(logs[0].phase).toBe('orders');
    expect(report.entries).toEqual([]);
  });
});
