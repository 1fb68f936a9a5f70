import { describe, it, expect } from 'vitest';
import { Memory } from '@core/bus/memory';
import { AddressError, LoadError } from '@core/cpu/errors';

describe('Memory', () => {
  it('starts zeroed with 256 cells', () => {
    const mem = new Memory();
    expect(mem.size).toBe(256);
    expect(mem.read(0)).toBe(0);
    expect(mem.read(255)).toBe(0);
  });

  it('writes and reads back at absolute addresses', () => {
    const mem = new Memory();
    mem.write(0x10, 0x42);
    mem.write(0xFF, 7);
    expect(mem.read(0x10)).toBe(0x42);
    expect(mem.read(0xFF)).toBe(7);
    expect(mem.read(0x11)).toBe(0);
  });

  it('stores values truncated to 8 bits', () => {
    const mem = new Memory();
    mem.write(3, 0x1FF);
    expect(mem.read(3)).toBe(0xFF);
    mem.write(4, 256);
    expect(mem.read(4)).toBe(0);
  });

  it('rejects out-of-range addresses on read and write', () => {
    const mem = new Memory();
    expect(() => mem.read(256)).toThrow(AddressError);
    expect(() => mem.read(-1)).toThrow(AddressError);
    expect(() => mem.write(256, 1)).toThrow(AddressError);
    expect(() => mem.read(1.5)).toThrow(AddressError);
  });

  it('reports the address and access kind', () => {
    const mem = new Memory();
    try {
      mem.write(300, 1);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(AddressError);
      if (e instanceof AddressError) {
        expect(e.address).toBe(300);
        expect(e.access).toBe('write');
        expect(e.message).toBe('write: address 300 outside bounds [0, 256)');
        expect(e.name).toBe('AddressError');
      }
    }
  });

  it('loads a program at an offset and refuses one that does not fit', () => {
    const mem = new Memory();
    mem.load(Uint8Array.from([1, 2, 3]), 10);
    expect([mem.read(10), mem.read(11), mem.read(12)]).toEqual([1, 2, 3]);
    expect(() => mem.load(new Uint8Array(10), 250)).toThrow(LoadError);
  });

  it('snapshot is a copy', () => {
    const mem = new Memory();
    mem.write(0, 9);
    const snap = mem.snapshot();
    mem.write(0, 10);
    expect(snap[0]).toBe(9);
    expect(snap.length).toBe(256);
  });
});
