/**
 * Immutable planar vector. Units follow context (km or km/s).
 */
export class Vector2 {
  static readonly ZERO = new Vector2(0, 0);

  readonly x: number;
  readonly y: number;

  constructor(x = 0, y = 0) {
    this.x = x;
    this.y = y;
    Object.freeze(this);
  }

  add(o: Vector2): Vector2 {
    return new Vector2(this.x + o.x, this.y + o.y);
  }

  sub(o: Vector2): Vector2 {
    return new Vector2(this.x - o.x, this.y - o.y);
  }

  scale(s: number): Vector2 {
    return new Vector2(this.x * s, this.y * s);
  }

  magnitude(): number {
    return Math.hypot(this.x, this.y);
  }
}
