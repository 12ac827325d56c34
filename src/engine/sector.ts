// Sector geometry — continuous positions inside a single hex sector.
// Offsets are measured from the sector centre in logical units.

import type { SectorOffset } from '@/engine/types';

export const SECTOR_CENTER: SectorOffset = { x: 0, y: 0 };

export function offsetDistance(a: SectorOffset, b: SectorOffset): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function isInsideSector(offset: SectorOffset, sectorRadius: number): boolean {
  return Math.hypot(offset.x, offset.y) <= sectorRadius;
}

/**
 * Moves from `from` towards `to` by at most `maxStep`. Returns the new
 * position, whether the target was reached and the distance left.
 */
export function stepTowards(
  from: SectorOffset,
  to: SectorOffset,
  maxStep: number,
): { position: SectorOffset; arrived: boolean; remaining: number } {
  const distance = offsetDistance(from, to);
  if (distance <= maxStep) {
    return { position: { x: to.x, y: to.y }, arrived: true, remaining: 0 };
  }
  const ratio = maxStep / distance;
  return {
    position: {
      x: from.x + (to.x - from.x) * ratio,
      y: from.y + (to.y - from.y) * ratio,
    },
    arrived: false,
    remaining: distance - maxStep,
  };
}

// ---------------------------------------------------------------------------
// Circles
// ---------------------------------------------------------------------------

export interface Circle {
  center: SectorOffset;
  radius: number;
}

// Pushed points land just past the rim so they no longer test as inside
const EDGE_MARGIN = 1.0001;

export function isInsideCircle(point: SectorOffset, circle: Circle): boolean {
  return offsetDistance(point, circle.center) <= circle.radius;
}

/** Touching circles do not overlap. */
export function circlesOverlap(a: Circle, b: Circle): boolean {
  return offsetDistance(a.center, b.center) < a.radius + b.radius;
}

export function isCircleInsideSector(circle: Circle, sectorRadius: number): boolean {
  return offsetDistance(circle.center, SECTOR_CENTER) + circle.radius <= sectorRadius;
}

/**
 * The point just outside `circle` closest to `point`. A point on the centre
 * is pushed along +x.
 */
export function pushToEdge(point: SectorOffset, circle: Circle): SectorOffset {
  const reach = circle.radius * EDGE_MARGIN;
  const distance = offsetDistance(circle.center, point);
  if (distance === 0) {
    return { x: circle.center.x + reach, y: circle.center.y };
  }
  return {
    x: circle.center.x + ((point.x - circle.center.x) / distance) * reach,
    y: circle.center.y + ((point.y - circle.center.y) / distance) * reach,
  };
}

/** The point at `distance` from `from` on the line towards `to`. */
export function pointAtDistance(from: SectorOffset, to: SectorOffset, distance: number): SectorOffset {
  const total = offsetDistance(from, to);
  if (total === 0) return { x: from.x, y: from.y };
  const ratio = distance / total;
  return { x: from.x + (to.x - from.x) * ratio, y: from.y + (to.y - from.y) * ratio };
}
