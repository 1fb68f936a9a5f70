import type { Address, Byte } from './types';

export type AccessKind = 'read' | 'write' | 'stack';

function hex2(v: number) { return (v & 0xFF).toString(16).toUpperCase().padStart(2, '0'); }

export function formatRegisters(registers: readonly Byte[]): string {
  return registers.map((v, i) => `R${i}=${hex2(v)}`).join(' ');
}

export class VMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Memory access outside [0, size); also raised for stack under/overflow
export class AddressError extends VMError {
  constructor(public readonly address: number, public readonly access: AccessKind, size = 256) {
    super(`${access}: address ${address} outside bounds [0, ${size})`);
  }
}

export class RegisterError extends VMError {
  constructor(public readonly index: number) {
    super(`register index ${index} outside [0, 8)`);
  }
}

export class UnknownOpcodeError extends VMError {
  constructor(public readonly address: Address, public readonly opcode: Byte, public readonly registers: Byte[]) {
    super(`Unknown opcode $${hex2(opcode)} at $${hex2(address)}\nRegs: ${formatRegisters(registers)}`);
  }
}

export class FatalError extends VMError {}

export class LoadError extends VMError {
  constructor(message: string, public readonly line?: number) {
    super(line !== undefined ? `line ${line}: ${message}` : message);
  }
}
