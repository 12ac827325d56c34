import { describe, it, expect } from 'vitest';
import { loadTopology, loadTopologyFromJson } from '@/lib/topology-loader';
import { makeTopology } from '@/engine/__tests__/fixtures';

function twoSystems(): Record<string, unknown> {
  return {
    id: 'pair',
    systems: [
      { id: 'a', name: 'A', radius: 1 },
      { id: 'b', name: 'B', radius: 1 },
    ],
    wormholes: [{ id: 'w1', a: { systemId: 'a', sector: { q: 1, r: 0 } }, b: { systemId: 'b', sector: { q: 0, r: 0 } }, cost: 1 }],
  };
}

describe('loadTopology', () => {
  it('accepts a connected galaxy unchanged', () => {
    expect(loadTopology(makeTopology())).toEqual(makeTopology());
  });

  it('fills defaults for optional fields', () => {
    const topology = loadTopology(twoSystems());
    expect(topology.disconnected).toBe(false);
    expect(topology.systems[0].bodies).toEqual([]);
  });

  it('defaults bodyClass to null', () => {
    const raw = {
      ...twoSystems(),
      systems: [
        {
          id: 'a',
          name: 'A',
          radius: 1,
          bodies: [{ id: 'a-star', name: 'A', kind: 'star', sector: { q: 0, r: 0 }, offset: { x: 0, y: 0 } }],
        },
        { id: 'b', name: 'B', radius: 1 },
      ],
    };
    expect(loadTopology(raw).systems[0].bodies[0].bodyClass).toBeNull();
  });

  it('rejects non-integer sector coordinates', () => {
    const raw = {
      ...twoSystems(),
      wormholes: [{ id: 'w1', a: { systemId: 'a', sector: { q: 0.5, r: 0 } }, b: { systemId: 'b', sector: { q: 0, r: 0 } }, cost: 1 }],
    };
    expect(() => loadTopology(raw)).toThrow(/^Topology validation failed: wormholes\.0\.a\.sector\.q/);
  });

  it('rejects wormholes to unknown systems', () => {
    const raw = {
      ...twoSystems(),
      wormholes: [{ id: 'w1', a: { systemId: 'a', sector: { q: 0, r: 0 } }, b: { systemId: 'zz', sector: { q: 0, r: 0 } }, cost: 1 }],
    };
    expect(() => loadTopology(raw)).toThrow('Topology validation failed: wormholes.w1: unknown system zz');
  });

  it('rejects self-loops', () => {
    const raw = {
      ...twoSystems(),
      wormholes: [{ id: 'w1', a: { systemId: 'a', sector: { q: 0, r: 0 } }, b: { systemId: 'a', sector: { q: 1, r: 0 } }, cost: 1 }],
    };
    expect(() => loadTopology(raw)).toThrow('Topology validation failed: wormholes.w1: self-loop on a');
  });

  it('rejects a second wormhole between the same pair', () => {
    const raw = twoSystems();
    const wormholes = [
      { id: 'w1', a: { systemId: 'a', sector: { q: 1, r: 0 } }, b: { systemId: 'b', sector: { q: 0, r: 0 } }, cost: 1 },
      { id: 'w2', a: { systemId: 'b', sector: { q: 1, r: 0 } }, b: { systemId: 'a', sector: { q: 0, r: 0 } }, cost: 3 },
    ];
    expect(() => loadTopology({ ...raw, wormholes })).toThrow(
      'Topology validation failed: wormholes.w2: duplicate edge a|b',
    );
  });

  it('rejects mouths outside their system', () => {
    const raw = {
      ...twoSystems(),
      wormholes: [{ id: 'w1', a: { systemId: 'a', sector: { q: 2, r: 0 } }, b: { systemId: 'b', sector: { q: 0, r: 0 } }, cost: 1 }],
    };
    expect(() => loadTopology(raw)).toThrow('Topology validation failed: wormholes.w1: mouth 2,0 outside a');
  });

  it('rejects colonizable bodies without a body class', () => {
    const raw = {
      ...twoSystems(),
      systems: [
        {
          id: 'a',
          name: 'A',
          radius: 1,
          bodies: [{ id: 'a-1', name: 'A I', kind: 'planet', sector: { q: 0, r: 0 }, offset: { x: 0, y: 0 } }],
        },
        { id: 'b', name: 'B', radius: 1 },
      ],
    };
    expect(() => loadTopology(raw)).toThrow(
      'Topology validation failed: systems.a.a-1: colonizable body has no bodyClass',
    );
  });

  it('checks body offsets against the sector radius', () => {
    const raw = {
      ...twoSystems(),
      systems: [
        {
          id: 'a',
          name: 'A',
          radius: 1,
          bodies: [{ id: 'a-star', name: 'A', kind: 'star', sector: { q: 0, r: 0 }, offset: { x: 600, y: 0 } }],
        },
        { id: 'b', name: 'B', radius: 1 },
      ],
    };
    expect(loadTopology(raw).id).toBe('pair');
    expect(() => loadTopology(raw, { sectorRadius: 500 })).toThrow(
      'Topology validation failed: systems.a.a-star: offset outside sector',
    );
  });

  it('rejects a disconnected galaxy unless flagged', () => {
    const raw = { ...twoSystems(), wormholes: [] };
    expect(() => loadTopology(raw)).toThrow('Topology validation failed: wormholes: galaxy graph is not connected');
    expect(loadTopology({ ...raw, disconnected: true }).disconnected).toBe(true);
  });
});

describe('loadTopologyFromJson', () => {
  it('rejects invalid JSON', () => {
    expect(() => loadTopologyFromJson('[')).toThrow('Failed to parse topology JSON');
  });

  it('rejects non-objects', () => {
    expect(() => loadTopologyFromJson('null')).toThrow('Topology data must be a non-null object');
  });
});
