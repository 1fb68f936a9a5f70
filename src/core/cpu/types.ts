export type Byte = number; // 0..255
export type Address = number; // 0..255

export const MEMORY_SIZE = 256;
export const REGISTER_COUNT = 8;

export interface CPUState {
  pc: Address;
  registers: Byte[]; // R0..R7, R6 = flags, R7 = stack pointer
  halted: boolean;
  steps: number;
}

// Outcome of a single handler: keep fetching or stop the loop
export type Directive = 'continue' | 'halt';

export interface TraceInfo {
  pc: Address;
  opcode: Byte;
  operands: [Byte, Byte];
  registers: Byte[];
}

export type OutputSink = (line: string) => void;
