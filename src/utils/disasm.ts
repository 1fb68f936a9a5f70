import type { Address, Byte } from "@core/cpu/types";
import { opcodeInfoForByte } from "@core/cpu/opcodes";
import type { OperandKind } from "@core/cpu/opcodes";

export type ReadByteFn = (addr: Address) => Byte;

export interface DisasmResult {
  bytes: number[];
  // opcode plus the two following bytes, whatever the instruction length
  raw: [Byte, Byte, Byte];
  mnemonic: string;
  operand: string;
  len: number;
}

function hex2(v: number) { return (v & 0xFF).toString(16).toUpperCase().padStart(2, "0"); }

export function disasmAt(read: ReadByteFn, pc: Address): DisasmResult {
  const op = read(pc & 0xFF) & 0xFF;
  const info = opcodeInfoForByte(op);
  const b1 = read((pc + 1) & 0xFF) & 0xFF;
  const b2 = read((pc + 2) & 0xFF) & 0xFF;
  const len = info ? info.len : 1;
  const bytes = len === 1 ? [op] : len === 2 ? [op, b1] : [op, b1, b2];
  const operand = info ? formatOperands(info.operands, [b1, b2]) : "";
  return { bytes, raw: [op, b1, b2], mnemonic: info ? info.mnem : "???", operand, len };
}

export function formatOperands(kinds: OperandKind[], values: Byte[]): string {
  return kinds.map((k, i) => (k === "reg" ? `R${values[i]}` : `#${values[i]}`)).join(",");
}

export function formatInstruction(res: DisasmResult): string {
  return (res.mnemonic + (res.operand ? " " + res.operand : "")).trim();
}

// TRACE: PC | MNEMONIC B1 B2 | R0 .. R7
export function formatTraceLine(pc: Address, res: DisasmResult, registers: readonly Byte[]): string {
  const regs = registers.map((v) => hex2(v)).join(" ");
  return `TRACE: ${hex2(pc)} | ${res.mnemonic} ${hex2(res.raw[1])} ${hex2(res.raw[2])} | ${regs}`;
}

// Linear listing of a program image, one instruction per line
export function disassemble(program: Uint8Array): string[] {
  const read = (addr: Address) => (addr < program.length ? program[addr] : 0);
  const out: string[] = [];
  let pc = 0;
  while (pc < program.length) {
    const res = disasmAt(read, pc);
    const bytesStr = res.bytes.map((b) => hex2(b)).join(" ").padEnd(9, " ");
    out.push(`${hex2(pc)}: ${bytesStr} ${formatInstruction(res)}`);
    pc += res.len;
  }
  return out;
}
