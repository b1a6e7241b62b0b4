/** Canonical 2D point interface */
export interface Point {
  x: number;
  y: number;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function distance(x1: number, y1: number, x2: number, y2: number): number {
  const dx = x2 - x1;
  const dy = y2 - y1;
  return Math.sqrt(dx * dx + dy * dy);
}

/** Point-based distance calculation for objects with x, y properties */
export function distanceXY(a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function clonePoint(point: Point | null): Point | null {
  return point ? { x: point.x, y: point.y } : null;
}

/** Euclidean modulo: result is always in [0, m) for positive m */
export function positiveModulo(value: number, m: number): number {
  return ((value % m) + m) % m;
}
