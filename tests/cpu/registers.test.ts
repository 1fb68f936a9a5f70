import { describe, it, expect } from 'vitest';
import { RegisterFile, FLAGS_REGISTER, STACK_POINTER_REGISTER } from '@core/cpu/registers';
import { RegisterError } from '@core/cpu/errors';

describe('RegisterFile', () => {
  it('initialises SP to 255 and everything else to 0', () => {
    const r = new RegisterFile();
    expect(r.dump()).toEqual([0, 0, 0, 0, 0, 0, 0, 255]);
    expect(r.stackPointer()).toBe(255);
    expect(r.flags()).toBe(0);
  });

  it('set then get returns the value mod 256 for every register', () => {
    const r = new RegisterFile();
    for (let i = 0; i < 8; i++) {
      for (const v of [0, 1, 127, 255, 256, 300, 511, -1]) {
        r.set(i, v);
        expect(r.get(i)).toBe(((v % 256) + 256) % 256);
      }
    }
  });

  it('named accessors alias the reserved slots', () => {
    const r = new RegisterFile();
    r.set(STACK_POINTER_REGISTER, 0x80);
    expect(r.stackPointer()).toBe(0x80);
    r.setFlags(0b100);
    expect(r.get(FLAGS_REGISTER)).toBe(0b100);
    expect(STACK_POINTER_REGISTER).toBe(7);
    expect(FLAGS_REGISTER).toBe(6);
  });

  it('rejects indices outside [0, 8)', () => {
    const r = new RegisterFile();
    expect(() => r.get(8)).toThrow(RegisterError);
    expect(() => r.get(-1)).toThrow(RegisterError);
    expect(() => r.set(200, 1)).toThrow('register index 200 outside [0, 8)');
  });

  it('reset restores the power-on values', () => {
    const r = new RegisterFile();
    r.set(0, 5);
    r.setStackPointer(3);
    r.reset();
    expect(r.dump()).toEqual([0, 0, 0, 0, 0, 0, 0, 255]);
  });
});
