import type { CPU } from './cpu';
import type { Byte } from './types';
import { formatRegisters } from './errors';
import { disasmAt, formatInstruction } from '@utils/disasm';

export interface FaultReport {
  kind: string;
  message: string;
  pc: number;
  opcode: Byte | null;
  instruction: string | null;
  registers: Byte[];
  recentPCs: number[];
  memory: { start: number; bytes: Byte[] };
}

function hex2(v: number) { return (v & 0xFF).toString(16).toUpperCase().padStart(2, '0'); }

// Snapshot of the machine at the point a run failed
export function describeFault(err: unknown, cpu: CPU): FaultReport {
  const kind = err instanceof Error ? err.name : 'Error';
  const message = err instanceof Error ? err.message : String(err);
  const mem = cpu.memory;
  const pc = cpu.pc;
  const valid = mem.isValidAddress(pc);
  const start = Math.max(0, Math.min(pc, mem.size) - 8);
  const end = Math.min(mem.size, start + 16);
  const bytes: Byte[] = [];
  for (let a = start; a < end; a++) bytes.push(mem.read(a));
  const read = (addr: number) => (mem.isValidAddress(addr) ? mem.read(addr) : 0);
  return {
    kind,
    message,
    pc,
    opcode: valid ? mem.read(pc) : null,
    instruction: valid ? formatInstruction(disasmAt(read, pc)) : null,
    registers: cpu.registers.dump(),
    recentPCs: cpu.getRecentPCs(),
    memory: { start, bytes },
  };
}

export function formatFault(report: FaultReport): string {
  const lines = [
    `${report.kind}: ${report.message.split('\n')[0]}`,
    `PC: ${report.pc >= 0 && report.pc < 256 ? `$${hex2(report.pc)}` : String(report.pc)}${report.instruction ? `  ${report.instruction}` : ''}`,
    `Regs: ${formatRegisters(report.registers)}`,
    `Mem[$${hex2(report.memory.start)}..]: ${report.memory.bytes.map(hex2).join(' ')}`,
    `TracePC: ${report.recentPCs.map((p) => `$${hex2(p)}`).join(' ')}`,
  ];
  return lines.join('\n');
}
