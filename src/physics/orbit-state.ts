import { TWO_PI } from '../constants';
import type { KeplerOptions, KeplerSolution, OrbitalElements } from '../types';
import { solveKeplerDetailed } from './kepler';
import { Vector2 } from './vector2';

/**
 * Reduce an angle to [0, 2π).
 */
export function wrapAngle(angle: number): number {
  const wrapped = angle % TWO_PI;
  return wrapped < 0 ? wrapped + TWO_PI : wrapped;
}

/**
 * Planar Keplerian orbit over fixed elements.
 *
 * Positions are in the perifocal frame (x toward periapsis, y along the
 * direction of motion at periapsis). Inclination, RAAN and argument of
 * perigee are carried for reporting only.
 *
 * Elements are trusted: a > 0, 0 <= e < 1 and mu > 0 must be validated by
 * the caller (see scripting/mission-schema).
 */
export class OrbitState {
  readonly elements: Readonly<OrbitalElements>;
  private readonly kepler: KeplerOptions;

  constructor(elements: OrbitalElements, kepler: KeplerOptions = {}) {
    this.elements = Object.freeze({ ...elements });
    this.kepler = Object.freeze({ ...kepler });
    Object.freeze(this);
  }

  get mu(): number { return this.elements.mu; }
  get a(): number { return this.elements.a; }
  get e(): number { return this.elements.e; }

  /** Orbital period (seconds). */
  period(): number {
    return TWO_PI * Math.sqrt(this.a ** 3 / this.mu);
  }

  /** Mean motion n (rad/s). */
  meanMotion(): number {
    return Math.sqrt(this.mu / this.a ** 3);
  }

  periapsisRadius(): number {
    return this.a * (1 - this.e);
  }

  apoapsisRadius(): number {
    return this.a * (1 + this.e);
  }

  /** Mean anomaly t seconds after periapsis passage, in [0, 2π). */
  meanAnomalyAt(t: number): number {
    return wrapAngle(this.meanMotion() * t);
  }

  /** Solve Kepler's equation with this orbit's eccentricity and solver options. */
  solve(M: number): KeplerSolution {
    return solveKeplerDetailed(M, this.e, this.kepler);
  }

  radiusAtMeanAnomaly(M: number): number {
    const E = this.solve(M).eccentricAnomaly;
    return this.a * (1 - this.e * Math.cos(E));
  }

  /**
   * Position (km) in the orbital plane for mean anomaly M (radians).
   * The radius lies in [a(1-e), a(1+e)].
   */
  positionFromMeanAnomaly(M: number): Vector2 {
    const { a, e } = this;
    const E = this.solve(M).eccentricAnomaly;
    const cosE = Math.cos(E);
    const denom = 1 - e * cosE;
    const r = a * denom;

    // True anomaly
    const cosf = (cosE - e) / denom;
    const sinf = (Math.sqrt(1 - e * e) * Math.sin(E)) / denom;
    const f = Math.atan2(sinf, cosf);

    return new Vector2(r * Math.cos(f), r * Math.sin(f));
  }

  /** Position t seconds after periapsis passage. */
  positionAtTime(t: number): Vector2 {
    return this.positionFromMeanAnomaly(this.meanAnomalyAt(t));
  }

  /**
   * Speed (km/s) at radius r from the vis-viva equation.
   * r is not checked against the orbit; beyond r = 2a the radicand is
   * negative and the result is NaN.
   */
  velocityAtRadius(r: number): number {
    return Math.sqrt(this.mu * (2 / r - 1 / this.a));
  }
}
