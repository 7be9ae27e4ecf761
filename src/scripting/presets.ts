import { DEFAULT_INCLINATION, EARTH_RADIUS, GEO_RADIUS } from '../constants';
import type { MissionPlan } from '../types';
import { DEFAULT_INPUT } from './mission-schema';

/**
 * Build a Hohmann transfer preset between two circular orbit altitudes.
 * Handles both orbit raising (from < to) and lowering (from > to).
 */
export function buildTransferPreset(
  name: string,
  fromAltKm: number,
  toAltKm: number,
  inclination = DEFAULT_INCLINATION
): MissionPlan {
  return {
    version: 1,
    name,
    input: {
      a: EARTH_RADIUS + fromAltKm,
      e: 0,
      i: inclination,
      raan: 0,
      argp: 0,
      targetRadius: EARTH_RADIUS + toAltKm,
      timeOffset: 0,
    },
  };
}

/**
 * Default demo: near-circular ~400 km LEO raised to GEO.
 */
export function leoGeoPreset(): MissionPlan {
  return { version: 1, name: 'LEO → GEO', input: { ...DEFAULT_INPUT } };
}

/** LEO (400km) → MEO (20190km, GNSS altitude) */
export function leoMeoPreset(): MissionPlan {
  return buildTransferPreset('LEO → MEO', 400, 20190, 55);
}

/** Orbit raise 420km → 540km */
export function orbitRaisePreset(): MissionPlan {
  return buildTransferPreset('Orbit Raise 420→540km', 420, 540, 51.6);
}

/** GEO → LEO (400km) return */
export function geoReturnPreset(): MissionPlan {
  return buildTransferPreset('GEO → LEO Return', GEO_RADIUS - EARTH_RADIUS, 400, 0);
}

export const PRESET_IDS = ['leo-geo', 'leo-meo', 'orbit-raise', 'geo-return'] as const;

export const DEFAULT_PRESET = 'leo-geo';

export function getPreset(name: string): MissionPlan | null {
  switch (name) {
    case 'leo-geo':     return leoGeoPreset();
    case 'leo-meo':     return leoMeoPreset();
    case 'orbit-raise': return orbitRaisePreset();
    case 'geo-return':  return geoReturnPreset();
    default: return null;
  }
}
