import { describe, it, expect } from 'vitest';
import { alu, compare, FLAG_EQ, FLAG_GT, FLAG_LT } from '@core/cpu/alu';

describe('ALU', () => {
  it('adds with wraparound', () => {
    expect(alu('ADD', 8, 9)).toBe(17);
    expect(alu('ADD', 250, 10)).toBe(4);
    expect(alu('ADD', 255, 255)).toBe(254);
  });

  it('subtracts with wraparound', () => {
    expect(alu('SUB', 10, 3)).toBe(7);
    expect(alu('SUB', 3, 10)).toBe(249);
  });

  it('multiplies with wraparound', () => {
    expect(alu('MUL', 8, 9)).toBe(72);
    expect(alu('MUL', 16, 16)).toBe(0);
    expect(alu('MUL', 200, 3)).toBe(88);
  });

  it('results always lie in [0, 256)', () => {
    for (let a = 0; a < 256; a += 17) {
      for (let b = 0; b < 256; b += 13) {
        for (const op of ['ADD', 'SUB', 'MUL'] as const) {
          const r = alu(op, a, b);
          expect(r >= 0 && r < 256).toBe(true);
        }
      }
    }
  });

  it('compare yields exactly one flag', () => {
    expect(compare(5, 5)).toBe(FLAG_EQ);
    expect(compare(6, 5)).toBe(FLAG_GT);
    expect(compare(4, 5)).toBe(FLAG_LT);
    for (const [a, b] of [[0, 0], [1, 0], [0, 1], [255, 254]]) {
      const f = compare(a, b);
      const set = [FLAG_EQ, FLAG_GT, FLAG_LT].filter((m) => (f & m) !== 0);
      expect(set.length).toBe(1);
    }
  });
});
