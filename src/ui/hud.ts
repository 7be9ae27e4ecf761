import { SECONDS_PER_HOUR } from '../constants';
import type { OrbitState } from '../physics/orbit-state';
import type { Telemetry } from '../types';
import { formatNumber } from './format';

/**
 * Range and speed of the spacecraft t seconds after periapsis passage.
 */
export function telemetrySnapshot(orbit: OrbitState, t: number): Telemetry {
  const meanAnomaly = orbit.meanAnomalyAt(t);
  const solution = orbit.solve(meanAnomaly);
  const range = orbit.a * (1 - orbit.e * Math.cos(solution.eccentricAnomaly));
  return {
    meanAnomaly,
    range,
    speed: orbit.velocityAtRadius(range),
    converged: solution.converged,
  };
}

/** Key/value lines describing the orbit. */
export function formatOrbitSummary(orbit: OrbitState): string {
  const { a, e, i } = orbit.elements;
  const deg = (v: number) => `${v.toFixed(1)}°`;
  return (
`SMA   ${formatNumber(a, 2)} km
ECC   ${formatNumber(e, 5)}
INC   ${deg(i)}
PER   ${formatNumber(orbit.periapsisRadius(), 2)} km
APO   ${formatNumber(orbit.apoapsisRadius(), 2)} km
T     ${formatNumber(orbit.period() / SECONDS_PER_HOUR, 4)} hours
n     ${formatNumber(orbit.meanMotion(), 8)} rad/s`);
}

export function formatTelemetry(telemetry: Telemetry): string {
  return (
`RANGE ${formatNumber(telemetry.range, 3)} km
VEL   ${formatNumber(telemetry.speed, 5)} km/s`);
}
