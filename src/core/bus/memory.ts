import type { Address, Byte } from '@core/cpu/types';
import { MEMORY_SIZE } from '@core/cpu/types';
import { AddressError, LoadError } from '@core/cpu/errors';
import type { AccessKind } from '@core/cpu/errors';

export interface BusDevice {
  read(addr: Address): Byte;
  write(addr: Address, value: Byte): void;
}

// Flat byte-addressed RAM. Every access is bounds-checked; nothing wraps.
export class Memory implements BusDevice {
  private ram: Uint8Array;

  constructor(size = MEMORY_SIZE) {
    this.ram = new Uint8Array(size);
  }

  get size(): number { return this.ram.length; }

  isValidAddress(addr: number): boolean {
    return Number.isInteger(addr) && addr >= 0 && addr < this.ram.length;
  }

  assertAddress(addr: number, access: AccessKind): void {
    if (!this.isValidAddress(addr)) throw new AddressError(addr, access, this.ram.length);
  }

  read(addr: Address): Byte {
    this.assertAddress(addr, 'read');
    return this.ram[addr];
  }

  write(addr: Address, value: Byte): void {
    this.assertAddress(addr, 'write');
    this.ram[addr] = value & 0xFF;
  }

  load(data: Uint8Array, offset = 0): void {
    if (offset < 0 || offset + data.length > this.ram.length) {
      throw new LoadError(`cannot fit ${data.length} bytes at ${offset}, memory holds ${this.ram.length}`);
    }
    this.ram.set(data, offset);
  }

  clear(): void { this.ram.fill(0); }

  snapshot(): Uint8Array { return this.ram.slice(); }
}
