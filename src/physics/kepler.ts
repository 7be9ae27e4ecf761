import {
  CIRCULAR_ECCENTRICITY,
  HIGH_ECCENTRICITY,
  KEPLER_MAX_ITERATIONS,
  KEPLER_TOLERANCE,
  TWO_PI,
} from '../constants';
import type { KeplerOptions, KeplerSolution } from '../types';

/** Residual of Kepler's equation f(E) = E - e*sin(E) - M. */
export function keplerResidual(E: number, e: number, M: number): number {
  return E - e * Math.sin(E) - M;
}

/**
 * Solve Kepler's equation M = E - e*sin(E) for eccentric anomaly E
 * via Newton-Raphson iteration, reporting how the iteration ended.
 *
 * M is used as given (not reduced to [0, 2π)). The solver never throws:
 * if the iteration budget runs out, the last iterate is returned with
 * `converged: false`.
 */
export function solveKeplerDetailed(
  M: number,
  e: number,
  options: KeplerOptions = {}
): KeplerSolution {
  const tolerance = options.tolerance ?? KEPLER_TOLERANCE;
  const maxIterations = options.maxIterations ?? KEPLER_MAX_ITERATIONS;

  // Circular: E = M
  if (e < CIRCULAR_ECCENTRICITY) {
    return { eccentricAnomaly: M, iterations: 0, residual: Math.abs(keplerResidual(M, e, M)), converged: true };
  }

  // High e starts from apoapsis of the revolution containing M, which is π for M in [0, 2π)
  let E = e < HIGH_ECCENTRICITY ? M : Math.PI + TWO_PI * Math.round((M - Math.PI) / TWO_PI);
  let iterations = 0;
  let converged = false;

  while (iterations < maxIterations) {
    const f = keplerResidual(E, e, M);
    const fp = 1 - e * Math.cos(E); // > 0 for e < 1
    const step = -f / fp;
    E += step;
    iterations++;
    if (Math.abs(step) < tolerance) {
      converged = true;
      break;
    }
  }

  return {
    eccentricAnomaly: E,
    iterations,
    residual: Math.abs(keplerResidual(E, e, M)),
    converged,
  };
}

/**
 * Eccentric anomaly for mean anomaly M (radians) and eccentricity e.
 * Best effort: see solveKeplerDetailed.
 */
export function solveKepler(M: number, e: number, options?: KeplerOptions): number {
  return solveKeplerDetailed(M, e, options).eccentricAnomaly;
}
