import {
  DEFAULT_ECCENTRICITY,
  DEFAULT_INCLINATION,
  DEFAULT_SEMI_MAJOR_AXIS,
  EARTH_RADIUS,
  GEO_RADIUS,
  MAX_ECCENTRICITY,
  MIN_SEMI_MAJOR_AXIS,
} from '../constants';
import type { MissionInput, MissionPlan } from '../types';

/** Raw form-style values, e.g. query parameters or CLI options. */
export type RawInput = Readonly<Record<string, string | undefined>>;

export const DEFAULT_INPUT: Readonly<MissionInput> = Object.freeze({
  a: DEFAULT_SEMI_MAJOR_AXIS,
  e: DEFAULT_ECCENTRICITY,
  i: DEFAULT_INCLINATION,
  raan: 0,
  argp: 0,
  targetRadius: GEO_RADIUS,
  timeOffset: 0,
});

/**
 * Lenient number read: missing or blank gives the default, thousands
 * separators are stripped, and anything unparseable falls back to the default.
 */
export function readNumber(raw: RawInput, key: string, fallback: number): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  const trimmed = value.trim().replace(/,/g, '');
  if (trimmed === '') return fallback;
  const parsed = Number.parseFloat(trimmed);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Build a MissionInput from raw values, filling defaults and clamping
 * a >= 1600 km and 0 <= e <= 0.9999.
 */
export function parseMissionInput(raw: RawInput, defaults: MissionInput = DEFAULT_INPUT): MissionInput {
  const a = readNumber(raw, 'a', defaults.a);
  const e = readNumber(raw, 'e', defaults.e);
  return {
    a: Math.max(MIN_SEMI_MAJOR_AXIS, a),
    e: Math.max(0, Math.min(MAX_ECCENTRICITY, e)),
    i: readNumber(raw, 'i', defaults.i),
    raan: readNumber(raw, 'raan', defaults.raan),
    argp: readNumber(raw, 'argp', defaults.argp),
    targetRadius: readNumber(raw, 'target_radius', readNumber(raw, 'target', defaults.targetRadius)),
    timeOffset: readNumber(raw, 't', defaults.timeOffset),
  };
}

/**
 * Check a MissionInput before it reaches the orbital engine.
 * @returns Human-readable errors; empty when the input is usable
 */
export function validateMissionInput(input: MissionInput): string[] {
  const errors: string[] = [];
  if (!(input.a > EARTH_RADIUS)) {
    errors.push(`Semi-major axis a must be larger than Earth radius (${EARTH_RADIUS} km).`);
  }
  if (!(input.e >= 0 && input.e < 1)) {
    errors.push('Eccentricity must satisfy 0 <= e < 1 for bound orbit.');
  }
  if (!(input.targetRadius > 0)) {
    errors.push('Target orbit radius must be positive.');
  }
  if (!(input.timeOffset >= 0)) {
    errors.push('Time offset t must be zero or positive.');
  }
  return errors;
}

const INPUT_KEYS = ['a', 'e', 'i', 'raan', 'argp', 'targetRadius', 'timeOffset'] as const;

function isFiniteNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Validate a MissionPlan from imported JSON.
 */
export function validateMissionPlan(data: unknown): MissionPlan | null {
  if (!isRecord(data)) return null;

  if (!isFiniteNumber(data.version)) return null;
  if (typeof data.name !== 'string' || data.name.length === 0) return null;
  if (!isRecord(data.input)) return null;

  const raw = data.input;
  if (!INPUT_KEYS.every((key) => isFiniteNumber(raw[key]))) return null;

  const input: MissionInput = {
    a: Number(raw.a),
    e: Number(raw.e),
    i: Number(raw.i),
    raan: Number(raw.raan),
    argp: Number(raw.argp),
    targetRadius: Number(raw.targetRadius),
    timeOffset: Number(raw.timeOffset),
  };
  if (validateMissionInput(input).length > 0) return null;

  return { version: data.version, name: data.name, input };
}

export function serializeMissionPlan(plan: MissionPlan): string {
  return JSON.stringify(plan, null, 2);
}
