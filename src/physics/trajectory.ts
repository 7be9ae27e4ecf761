import { TWO_PI } from '../constants';
import type { OrbitState } from './orbit-state';
import type { Vector2 } from './vector2';

/**
 * Generate orbit path positions analytically from the Keplerian elements,
 * one point per evenly spaced mean anomaly starting at periapsis.
 *
 * Points are spaced uniformly in time, so they bunch up near apoapsis on
 * eccentric orbits.
 */
export function sampleOrbit(orbit: OrbitState, numPoints = 720): Vector2[] {
  const points: Vector2[] = [];
  for (let k = 0; k < numPoints; k++) {
    points.push(orbit.positionFromMeanAnomaly((TWO_PI * k) / numPoints));
  }
  return points;
}

export interface Bounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/** Axis-aligned bounding box of a set of points. */
export function boundsOf(points: readonly Vector2[]): Bounds {
  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    maxX = Math.max(maxX, p.x);
    minY = Math.min(minY, p.y);
    maxY = Math.max(maxY, p.y);
  }
  return { minX, maxX, minY, maxY };
}
