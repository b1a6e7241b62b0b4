import { describe, it, expect } from 'vitest';
import { clamp, clonePoint, distance, distanceXY, positiveModulo } from '@/utils/math';

describe('math utilities', () => {
  it('clamps values within bounds', () => {
    expect(clamp(5, 0, 10)).toBe(5);
    expect(clamp(-2, 0, 10)).toBe(0);
    expect(clamp(20, 0, 10)).toBe(10);
  });

  it('computes distances consistently', () => {
    expect(distance(0, 0, 3, 4)).toBe(5);
    expect(distanceXY({ x: 1, y: 1 }, { x: 4, y: 5 })).toBe(5);
  });

  it('wraps negative values into [0, m)', () => {
    expect(positiveModulo(-1, 10)).toBe(9);
    expect(positiveModulo(25, 10)).toBe(5);
  });

  it('copies points and passes null through', () => {
    const p = { x: 1, y: 2 };
    const copy = clonePoint(p);

    expect(copy).toEqual(p);
    expect(copy).not.toBe(p);
    expect(clonePoint(null)).toBeNull();
  });
});
