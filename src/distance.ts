import type { Point } from './types';

/** Euclidean distance between two points. */
export function distance(a: Point, b: Point): number {
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  return Math.hypot(dx, dy);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function formatPoint(p: Point): string {
  return `(${p[0]}, ${p[1]})`;
}
