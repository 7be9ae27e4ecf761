// Gravitational parameter of Earth (km^3/s^2)
export const MU_EARTH = 398600.4418;

// Earth mean radius (km)
export const EARTH_RADIUS = 6371;

// Geostationary orbit radius (km)
export const GEO_RADIUS = 42164;

export const TWO_PI = 2 * Math.PI;

// Kepler solver defaults
export const KEPLER_TOLERANCE = 1e-9;
export const KEPLER_MAX_ITERATIONS = 200;

// Below this eccentricity the orbit is treated as circular (E = M)
export const CIRCULAR_ECCENTRICITY = 1e-8;

// Above this eccentricity Newton starts from E = π instead of E = M
export const HIGH_ECCENTRICITY = 0.8;

// Input clamps applied before an orbit is built
export const MIN_SEMI_MAJOR_AXIS = 1600;
export const MAX_ECCENTRICITY = 0.9999;

// Default mission: ~400 km LEO raised to GEO
export const DEFAULT_SEMI_MAJOR_AXIS = 6771;
export const DEFAULT_ECCENTRICITY = 0.001;
export const DEFAULT_INCLINATION = 28.5;

export const SECONDS_PER_HOUR = 3600;
