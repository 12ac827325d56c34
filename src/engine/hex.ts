// Hex geometry — axial coordinates for the sector grid of a star system.
// Pure functions: no side effects, no randomness.

import type { HexCoord } from '@/engine/types';

export const HEX_ORIGIN: HexCoord = { q: 0, r: 0 };

// ---------------------------------------------------------------------------
// Keys & equality
// ---------------------------------------------------------------------------

export function hexKey(coord: HexCoord): string {
  return `${coord.q},${coord.r}`;
}

export function hexEquals(a: HexCoord, b: HexCoord): boolean {
  return a.q === b.q && a.r === b.r;
}

// ---------------------------------------------------------------------------
// Distance & bounds
// ---------------------------------------------------------------------------

export function hexDistance(a: HexCoord, b: HexCoord): number {
  const dq = a.q - b.q;
  const dr = a.r - b.r;
  return (Math.abs(dq) + Math.abs(dr) + Math.abs(dq + dr)) / 2;
}

/** True when `coord` lies on a hex grid of the given radius centred on (0,0). */
export function isWithinRadius(coord: HexCoord, radius: number): boolean {
  return hexDistance(HEX_ORIGIN, coord) <= radius;
}

// ---------------------------------------------------------------------------
// Line drawing
// ---------------------------------------------------------------------------

function hexRound(q: number, r: number): HexCoord {
  const s = -q - r;
  let rq = Math.round(q);
  let rr = Math.round(r);
  const rs = Math.round(s);

  const dq = Math.abs(rq - q);
  const dr = Math.abs(rr - r);
  const ds = Math.abs(rs - s);

  if (dq > dr && dq > ds) {
    rq = -rr - rs;
  } else if (dr > ds) {
    rr = -rq - rs;
  }
  // Normalise -0 so that keys and equality checks stay stable
  return { q: rq + 0, r: rr + 0 };
}

/** Interpolated point `t` of the way from `a` to `b`, rounded to the nearest hex. */
export function hexLerp(a: HexCoord, b: HexCoord, t: number): HexCoord {
  // Nudge avoids landing exactly on a hex edge
  const eps = 1e-6;
  return hexRound(
    a.q + eps + (b.q - a.q) * t,
    a.r + eps + (b.r - a.r) * t,
  );
}
