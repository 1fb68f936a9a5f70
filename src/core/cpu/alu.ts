import type { Byte } from './types';
import { FatalError } from './errors';

// Comparison flags (mutually exclusive)
export const FLAG_EQ = 1 << 0;
export const FLAG_GT = 1 << 1;
export const FLAG_LT = 1 << 2;

export type AluOp = 'ADD' | 'SUB' | 'MUL';
export type CompareFlag = typeof FLAG_EQ | typeof FLAG_GT | typeof FLAG_LT;

export function alu(op: AluOp, a: Byte, b: Byte): Byte {
  switch (op) {
    case 'ADD': return (a + b) & 0xFF;
    case 'SUB': return (a - b) & 0xFF;
    case 'MUL': return Math.imul(a, b) & 0xFF;
    default: {
      const unknown: never = op;
      throw new FatalError(`Unsupported ALU operation: ${String(unknown)}`);
    }
  }
}

export function compare(a: Byte, b: Byte): CompareFlag {
  if (a === b) return FLAG_EQ;
  return a > b ? FLAG_GT : FLAG_LT;
}
