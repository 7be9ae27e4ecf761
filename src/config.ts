/**
 * Central configuration for the mission planner
 *
 * Loads environment variables from .env file (if present) and provides
 * typed defaults for all configurable values.
 */
import { config as loadDotenv } from 'dotenv';
import {
  KEPLER_MAX_ITERATIONS,
  KEPLER_TOLERANCE,
  MU_EARTH,
} from './constants';

loadDotenv({ quiet: true });

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export function loadConfig() {
  return Object.freeze({
    /** Gravitational parameter of the central body (km^3/s^2) */
    mu: envNumber('MISSION_MU', MU_EARTH),

    kepler: Object.freeze({
      tolerance: envNumber('MISSION_KEPLER_TOLERANCE', KEPLER_TOLERANCE),
      maxIterations: envNumber('MISSION_KEPLER_MAX_ITERATIONS', KEPLER_MAX_ITERATIONS),
    }),

    svg: Object.freeze({
      size: envNumber('MISSION_SVG_SIZE', 700),
      margin: envNumber('MISSION_SVG_MARGIN', 28),
      /** Samples along the orbit path */
      points: envNumber('MISSION_SVG_POINTS', 540),
    }),

    /** Hours between "now" and the planned launch on the timeline */
    launchDelayHours: envNumber('MISSION_LAUNCH_DELAY_HOURS', 72),
  });
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();
