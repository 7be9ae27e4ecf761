export interface OrbitalElements {
  mu: number;   // gravitational parameter (km^3/s^2)
  a: number;    // semi-major axis (km)
  e: number;    // eccentricity, [0, 1)
  i: number;    // inclination (deg), reporting only
  raan: number; // right ascension of ascending node (deg), reporting only
  argp: number; // argument of perigee (deg), reporting only
}

export interface KeplerOptions {
  tolerance?: number;
  maxIterations?: number;
}

export interface KeplerSolution {
  eccentricAnomaly: number; // radians
  iterations: number;
  residual: number;         // |E - e*sin(E) - M|
  converged: boolean;
}

export interface TransferResult {
  dv1: number;                   // km/s
  dv2: number;                   // km/s
  dvTotal: number;               // km/s
  timeOfFlight: number;          // seconds
  transferSemiMajorAxis: number; // km
}

export interface MissionInput {
  a: number;            // km
  e: number;
  i: number;            // deg
  raan: number;         // deg
  argp: number;         // deg
  targetRadius: number; // km
  timeOffset: number;   // seconds since epoch (periapsis passage)
}

export interface MissionPlan {
  version: number;
  name: string;
  input: MissionInput;
}

export interface MissionEvent {
  time: Date;
  title: string;
  description: string;
}

export interface Telemetry {
  meanAnomaly: number; // radians, [0, 2π)
  range: number;       // km from central body
  speed: number;       // km/s
  converged: boolean;
}
