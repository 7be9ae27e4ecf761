import { describe, it, expect } from 'vitest';
import {
  DEFAULT_INPUT,
  parseMissionInput,
  readNumber,
  serializeMissionPlan,
  validateMissionInput,
  validateMissionPlan,
} from '../src/scripting/mission-schema';
import { PRESET_IDS, getPreset } from '../src/scripting/presets';
import { computeTransfer } from '../src/physics/maneuver';
import { MU_EARTH } from '../src/constants';

describe('readNumber', () => {
  it('falls back on missing, blank or unparseable values', () => {
    expect(readNumber({}, 'a', 42)).toBe(42);
    expect(readNumber({ a: '   ' }, 'a', 42)).toBe(42);
    expect(readNumber({ a: 'abc' }, 'a', 42)).toBe(42);
  });

  it('strips thousands separators and whitespace', () => {
    expect(readNumber({ a: ' 42,164.5 ' }, 'a', 0)).toBe(42164.5);
    expect(readNumber({ a: '-3.25' }, 'a', 0)).toBe(-3.25);
    expect(readNumber({ a: '1e3' }, 'a', 0)).toBe(1000);
  });
});

describe('parseMissionInput', () => {
  it('uses defaults for an empty form', () => {
    expect(parseMissionInput({})).toEqual({
      a: 6771,
      e: 0.001,
      i: 28.5,
      raan: 0,
      argp: 0,
      targetRadius: 42164,
      timeOffset: 0,
    });
  });

  it('clamps semi-major axis and eccentricity', () => {
    expect(parseMissionInput({ a: '1000' }).a).toBe(1600);
    expect(parseMissionInput({ e: '1.5' }).e).toBe(0.9999);
    expect(parseMissionInput({ e: '-0.2' }).e).toBe(0);
  });

  it('reads the target from target_radius before target', () => {
    expect(parseMissionInput({ target: '26561' }).targetRadius).toBe(26561);
    expect(parseMissionInput({ target: '26561', target_radius: '7000' }).targetRadius).toBe(7000);
  });

  it('fills unspecified fields from the given defaults', () => {
    const base = { ...DEFAULT_INPUT, a: 9000, timeOffset: 600 };
    expect(parseMissionInput({ t: '1200' }, base)).toEqual({ ...base, timeOffset: 1200 });
  });
});

describe('validateMissionInput', () => {
  it('accepts the default mission', () => {
    expect(validateMissionInput({ ...DEFAULT_INPUT })).toEqual([]);
  });

  it('rejects orbits inside the central body', () => {
    expect(validateMissionInput({ ...DEFAULT_INPUT, a: 6000 })).toEqual([
      'Semi-major axis a must be larger than Earth radius (6371 km).',
    ]);
  });

  it('rejects unbound eccentricities', () => {
    expect(validateMissionInput({ ...DEFAULT_INPUT, e: 0.9999 })).toEqual([]);
    expect(validateMissionInput({ ...DEFAULT_INPUT, e: 1 })).toEqual([
      'Eccentricity must satisfy 0 <= e < 1 for bound orbit.',
    ]);
  });

  it('rejects NaN and non-positive targets', () => {
    const errors = validateMissionInput({ ...DEFAULT_INPUT, a: NaN, targetRadius: 0, timeOffset: -1 });
    expect(errors).toHaveLength(3);
    expect(errors[1]).toBe('Target orbit radius must be positive.');
    expect(errors[2]).toBe('Time offset t must be zero or positive.');
  });
});

describe('validateMissionPlan', () => {
  const base = {
    version: 1,
    name: 'Test',
    input: { a: 7000, e: 0.01, i: 51.6, raan: 0, argp: 0, targetRadius: 26561, timeOffset: 0 },
  };

  it('accepts a valid plan', () => {
    expect(validateMissionPlan(base)).toEqual(base);
  });

  it('rejects NaN values', () => {
    const bad = structuredClone(base);
    bad.input.e = NaN;
    expect(validateMissionPlan(bad)).toBeNull();
  });

  it('rejects missing fields', () => {
    const input: Record<string, number> = { ...base.input };
    delete input.timeOffset;
    expect(validateMissionPlan({ ...base, input })).toBeNull();
  });

  it('rejects empty names', () => {
    expect(validateMissionPlan({ ...base, name: '' })).toBeNull();
  });

  it('rejects orbits that fail input validation', () => {
    expect(validateMissionPlan({ ...base, input: { ...base.input, a: 5000 } })).toBeNull();
  });

  it('rejects non-objects', () => {
    expect(validateMissionPlan(null)).toBeNull();
    expect(validateMissionPlan([base])).toBeNull();
    expect(validateMissionPlan('plan')).toBeNull();
  });

  it('reads back what it serializes', () => {
    expect(validateMissionPlan(JSON.parse(serializeMissionPlan(base)))).toEqual(base);
  });
});

describe('presets', () => {
  it('all validate', () => {
    for (const id of PRESET_IDS) {
      expect(validateMissionPlan(getPreset(id))).not.toBeNull();
    }
  });

  it('returns null for unknown presets', () => {
    expect(getPreset('moon-landing')).toBeNull();
  });

  it('builds circular orbits at altitude', () => {
    const plan = getPreset('leo-meo');
    expect(plan?.input.a).toBe(6771);
    expect(plan?.input.e).toBe(0);
    expect(plan?.input.targetRadius).toBe(26561);
  });

  it('mirrors the default transfer when lowering from GEO', () => {
    const plan = getPreset('geo-return');
    expect(plan?.input.a).toBe(42164);
    expect(plan?.input.targetRadius).toBe(6771);

    const raise = computeTransfer(MU_EARTH, 6771, 42164);
    const lower = computeTransfer(MU_EARTH, 42164, 6771);
    expect(lower.dvTotal).toBeCloseTo(raise.dvTotal, 12);
  });
});
