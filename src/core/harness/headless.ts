import { CPU } from '@core/cpu/cpu';
import { describeFault } from '@core/cpu/diagnostics';
import type { FaultReport } from '@core/cpu/diagnostics';
import type { Byte, TraceInfo } from '@core/cpu/types';
import { disasmAt, formatTraceLine } from '@utils/disasm';
import { crc32 } from '@utils/crc32';

export interface RunOptions {
  // 0 or absent = no limit; the VM itself has no timeout
  maxSteps?: number;
  // receives one formatted TRACE line per instruction
  trace?: (line: string) => void;
  // receives PRN lines as they happen, in addition to RunResult.output
  output?: (line: string) => void;
}

export interface RunResult {
  steps: number;
  reason: 'halt' | 'fail' | 'timeout';
  message?: string;
  fault?: FaultReport;
  output: string[];
  registers: Byte[];
  memory: Uint8Array;
  memoryCrc: number;
}

export function traceLineFor(cpu: CPU, info: TraceInfo): string {
  const read = (addr: number) => (cpu.memory.isValidAddress(addr) ? cpu.memory.read(addr) : 0);
  return formatTraceLine(info.pc, disasmAt(read, info.pc), info.registers);
}

export function runProgram(program: Uint8Array, opts: RunOptions = {}): RunResult {
  const cpu = new CPU();
  cpu.load(program);
  const output: string[] = [];
  cpu.setOutput((line) => {
    output.push(line);
    if (opts.output) opts.output(line);
  });
  const trace = opts.trace;
  if (trace) cpu.setTraceHook((info) => trace(traceLineFor(cpu, info)));

  const finish = (reason: RunResult['reason'], extra: Pick<RunResult, 'message' | 'fault'> = {}): RunResult => {
    const memory = cpu.memory.snapshot();
    return { steps: cpu.state.steps, reason, ...extra, output, registers: cpu.registers.dump(), memory, memoryCrc: crc32(memory) };
  };

  const maxSteps = opts.maxSteps ?? 0;
  if (maxSteps <= 0) {
    try {
      cpu.run();
    } catch (e) {
      const fault = describeFault(e, cpu);
      return finish('fail', { message: fault.message, fault });
    }
    return finish('halt');
  }

  if (!cpu.hasProgram) return finish('halt');
  while (cpu.state.steps < maxSteps) {
    try {
      if (cpu.step() === 'halt') return finish('halt');
    } catch (e) {
      const fault = describeFault(e, cpu);
      return finish('fail', { message: fault.message, fault });
    }
  }
  return finish('timeout');
}
