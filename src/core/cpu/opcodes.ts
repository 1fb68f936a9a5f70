import type { Byte } from './types';

// Instruction bytes. The top two bits of each value count its operands.
export enum Opcode {
  HLT = 0x01,
  RET = 0x11,
  PUSH = 0x45,
  POP = 0x46,
  PRN = 0x47,
  CALL = 0x50,
  JMP = 0x54,
  JEQ = 0x55,
  JNE = 0x56,
  LDI = 0x82,
  ADD = 0xA0,
  SUB = 0xA1,
  MUL = 0xA2,
  CMP = 0xA7,
}

export type OperandKind = 'reg' | 'imm';

export interface OpInfo {
  op: Opcode;
  mnem: string;
  len: 1 | 2 | 3;
  operands: OperandKind[];
}

const TABLE: Record<Opcode, OpInfo> = {
  [Opcode.HLT]: { op: Opcode.HLT, mnem: 'HLT', len: 1, operands: [] },
  [Opcode.RET]: { op: Opcode.RET, mnem: 'RET', len: 1, operands: [] },
  [Opcode.PUSH]: { op: Opcode.PUSH, mnem: 'PUSH', len: 2, operands: ['reg'] },
  [Opcode.POP]: { op: Opcode.POP, mnem: 'POP', len: 2, operands: ['reg'] },
  [Opcode.PRN]: { op: Opcode.PRN, mnem: 'PRN', len: 2, operands: ['reg'] },
  [Opcode.CALL]: { op: Opcode.CALL, mnem: 'CALL', len: 2, operands: ['reg'] },
  [Opcode.JMP]: { op: Opcode.JMP, mnem: 'JMP', len: 2, operands: ['reg'] },
  [Opcode.JEQ]: { op: Opcode.JEQ, mnem: 'JEQ', len: 2, operands: ['reg'] },
  [Opcode.JNE]: { op: Opcode.JNE, mnem: 'JNE', len: 2, operands: ['reg'] },
  [Opcode.LDI]: { op: Opcode.LDI, mnem: 'LDI', len: 3, operands: ['reg', 'imm'] },
  [Opcode.ADD]: { op: Opcode.ADD, mnem: 'ADD', len: 3, operands: ['reg', 'reg'] },
  [Opcode.SUB]: { op: Opcode.SUB, mnem: 'SUB', len: 3, operands: ['reg', 'reg'] },
  [Opcode.MUL]: { op: Opcode.MUL, mnem: 'MUL', len: 3, operands: ['reg', 'reg'] },
  [Opcode.CMP]: { op: Opcode.CMP, mnem: 'CMP', len: 3, operands: ['reg', 'reg'] },
};

// Byte -> info, built once; null marks bytes outside the instruction set
const BY_BYTE: (OpInfo | null)[] = new Array<OpInfo | null>(256).fill(null);
const BY_MNEMONIC = new Map<string, OpInfo>();
for (const info of Object.values(TABLE)) {
  BY_BYTE[info.op] = info;
  BY_MNEMONIC.set(info.mnem, info);
}

export function decodeOpcode(byte: Byte): Opcode | null {
  const info = BY_BYTE[byte & 0xFF];
  return info ? info.op : null;
}

export function opcodeInfo(op: Opcode): OpInfo {
  return TABLE[op];
}

export function opcodeInfoForByte(byte: Byte): OpInfo | null {
  return BY_BYTE[byte & 0xFF];
}

export function opcodeByMnemonic(mnem: string): OpInfo | null {
  return BY_MNEMONIC.get(mnem.toUpperCase()) ?? null;
}

export function allOpcodes(): OpInfo[] {
  return Object.values(TABLE);
}
