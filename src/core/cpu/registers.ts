import type { Byte } from './types';
import { MEMORY_SIZE, REGISTER_COUNT } from './types';
import { RegisterError } from './errors';

// Reserved slots, by convention only: storage is the same as any other register
export const FLAGS_REGISTER = 6;
export const STACK_POINTER_REGISTER = 7;
export const STACK_POINTER_INIT = MEMORY_SIZE - 1;

export class RegisterFile {
  private reg = new Uint8Array(REGISTER_COUNT);

  constructor() {
    this.reset();
  }

  reset(): void {
    this.reg.fill(0);
    this.reg[STACK_POINTER_REGISTER] = STACK_POINTER_INIT;
  }

  private check(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= REGISTER_COUNT) throw new RegisterError(index);
  }

  get(index: number): Byte {
    this.check(index);
    return this.reg[index];
  }

  set(index: number, value: number): void {
    this.check(index);
    this.reg[index] = value & 0xFF;
  }

  stackPointer(): Byte { return this.reg[STACK_POINTER_REGISTER]; }
  setStackPointer(value: number): void { this.reg[STACK_POINTER_REGISTER] = value & 0xFF; }

  flags(): Byte { return this.reg[FLAGS_REGISTER]; }
  setFlags(value: number): void { this.reg[FLAGS_REGISTER] = value & 0xFF; }

  dump(): Byte[] { return Array.from(this.reg); }
}
