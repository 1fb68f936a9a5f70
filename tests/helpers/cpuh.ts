import { CPU } from '@core/cpu/cpu';

// Load bytes at address 0 and capture PRN output instead of printing it
export function cpuWithProgram(bytes: number[]) {
  const cpu = new CPU();
  const out: string[] = [];
  cpu.setOutput((line) => out.push(line));
  cpu.load(Uint8Array.from(bytes));
  return { cpu, memory: cpu.memory, out };
}
