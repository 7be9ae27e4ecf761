import { EARTH_RADIUS } from '../constants';
import type { OrbitState } from '../physics/orbit-state';
import { boundsOf, sampleOrbit } from '../physics/trajectory';
import { Vector2 } from '../physics/vector2';

export interface OrbitSvgOptions {
  size?: number;
  margin?: number;
  points?: number;
  /** Pixels per km; derived from the orbit's extent when omitted */
  scale?: number;
  /** Seconds after periapsis passage at which to mark the spacecraft */
  timeOffset?: number;
}

const BACKGROUND = '#050517';
const BODY_FILL = '#1463ff';
const PATH_STROKE = '#ffffff55';
const SPACECRAFT_FILL = '#ffcc33';

const fmt = (v: number) => v.toFixed(2);

/**
 * Render the orbit as a standalone SVG document: central body at the
 * focus, orbit polyline, and optionally the spacecraft at timeOffset.
 * The drawing is centred on the orbit's bounding box.
 * Screen y grows downward, so orbital-plane y is flipped.
 */
export function renderOrbitSvg(orbit: OrbitState, options: OrbitSvgOptions = {}): string {
  const size = options.size ?? 700;
  const margin = options.margin ?? 40;
  const positions = sampleOrbit(orbit, options.points ?? 720);

  // Include the central body's neighbourhood so circular orbits aren't cropped
  const bounds = boundsOf(positions);
  const minX = Math.min(bounds.minX, -1.1 * orbit.a);
  const maxX = Math.max(bounds.maxX, 1.1 * orbit.a);
  const minY = Math.min(bounds.minY, -1.1 * orbit.a);
  const maxY = Math.max(bounds.maxY, 1.1 * orbit.a);
  const width = maxX - minX;
  const height = maxY - minY;

  const inner = size - 2 * margin;
  const scale = options.scale ?? Math.min(inner / width, inner / height);
  const cx = margin + inner / 2;
  const cy = margin + inner / 2;

  const project = (p: Vector2): [number, number] => [
    cx + (p.x - (minX + width / 2)) * scale,
    cy - (p.y - (minY + height / 2)) * scale,
  ];

  const parts: string[] = [];
  parts.push(`<svg xmlns='http://www.w3.org/2000/svg' width='${size}' height='${size}' viewBox='0 0 ${size} ${size}'>`);
  parts.push(`<rect width='100%' height='100%' fill='${BACKGROUND}' rx='12'/>`);

  // Central body sits at the focus, not necessarily the canvas centre
  const [bx, by] = project(Vector2.ZERO);
  const bodyRadius = Math.max(4, EARTH_RADIUS * scale * 0.0005);
  parts.push(`<circle cx='${fmt(bx)}' cy='${fmt(by)}' r='${fmt(bodyRadius)}' fill='${BODY_FILL}' stroke='#ffffff11'/>`);

  const path = positions.map((p) => {
    const [sx, sy] = project(p);
    return `${fmt(sx)},${fmt(sy)}`;
  });
  parts.push(`<polyline fill='none' stroke='${PATH_STROKE}' stroke-width='1' points='${path.join(' ')}'/>`);

  if (options.timeOffset !== undefined) {
    const [sx, sy] = project(orbit.positionAtTime(options.timeOffset));
    parts.push(`<circle cx='${fmt(sx)}' cy='${fmt(sy)}' r='4' fill='${SPACECRAFT_FILL}'/>`);
    parts.push(
      `<text x='${fmt(sx + 8)}' y='${fmt(sy - 8)}' font-family='monospace' font-size='12' fill='#ffffffcc'>Spacecraft</text>`
    );
  }

  parts.push('</svg>');
  return parts.join('');
}
