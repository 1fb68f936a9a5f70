import type { Address, Byte, CPUState, Directive, OutputSink, TraceInfo } from './types';
import { Memory } from '@core/bus/memory';
import { RegisterFile } from './registers';
import { Stack } from './stack';
import { alu, compare, FLAG_EQ } from './alu';
import type { AluOp } from './alu';
import { decodeOpcode, opcodeInfo, Opcode } from './opcodes';
import { AddressError, UnknownOpcodeError } from './errors';

export interface RunSummary {
  steps: number;
}

export class CPU {
  readonly memory: Memory;
  readonly registers: RegisterFile;
  readonly stack: Stack;
  pc: Address = 0;
  private running = false;
  private halted = false;
  private steps = 0;
  private programLength = 0;
  // ring of recently executed PCs, reported with fault diagnostics
  private tracePC: number[] = new Array(32).fill(0);
  private traceIdx = 0;
  // eslint-disable-next-line no-console
  private output: OutputSink = (line) => console.log(line);
  // optional per-instruction trace callback (called before the handler runs)
  private traceHook: ((info: TraceInfo) => void) | null = null;

  constructor(memory: Memory = new Memory()) {
    this.memory = memory;
    this.registers = new RegisterFile();
    this.stack = new Stack(this.memory, this.registers);
  }

  setOutput(fn: OutputSink) { this.output = fn; }
  setTraceHook(fn: ((info: TraceInfo) => void) | null) { this.traceHook = fn; }
  // Read back the recent PC ring (oldest->newest), up to count entries
  getRecentPCs(count = 8): number[] {
    const n = Math.min(count, this.tracePC.length, this.traceIdx);
    const out: number[] = [];
    for (let i = this.traceIdx - n; i < this.traceIdx; i++) {
      out.push(this.tracePC[i & 31]);
    }
    return out;
  }

  get state(): CPUState {
    return { pc: this.pc, registers: this.registers.dump(), halted: this.halted, steps: this.steps };
  }

  get isHalted(): boolean { return this.halted; }
  get hasProgram(): boolean { return this.programLength > 0; }

  reset(): void {
    this.pc = 0;
    this.registers.reset();
    this.running = false;
    this.halted = false;
    this.steps = 0;
    this.traceIdx = 0;
  }

  // Place a program at address 0. An empty program is valid and halts on run().
  load(program: Uint8Array): void {
    this.memory.clear();
    this.memory.load(program, 0);
    this.programLength = program.length;
    this.reset();
  }

  run(): RunSummary {
    const start = this.steps;
    if (!this.hasProgram) {
      this.halted = true;
      return { steps: 0 };
    }
    this.running = true;
    try {
      while (this.running) {
        if (this.step() === 'halt') this.running = false;
      }
    } finally {
      this.running = false;
    }
    return { steps: this.steps - start };
  }

  step(): Directive {
    if (this.halted) return 'halt';
    try {
      const directive = this.cycle();
      if (directive === 'halt') this.halted = true;
      return directive;
    } catch (e) {
      // every VM error is fatal: the run ends here
      this.halted = true;
      throw e;
    }
  }

  private cycle(): Directive {
    const pc = this.pc;
    const byte = this.memory.read(pc);
    const op = decodeOpcode(byte);
    if (op === null) throw new UnknownOpcodeError(pc, byte, this.registers.dump());
    if (this.traceHook) {
      this.traceHook({ pc, opcode: byte, operands: [this.peek(pc + 1), this.peek(pc + 2)], registers: this.registers.dump() });
    }
    this.tracePC[this.traceIdx & 31] = pc;
    this.traceIdx++;
    this.steps++;
    return this.execute(op);
  }

  // Operand bytes read through memory so truncated instructions raise AddressError
  private operand(n: 1 | 2): Byte {
    return this.memory.read(this.pc + n);
  }

  // Trace-only read: no bounds error for bytes past the end of RAM
  private peek(addr: number): Byte {
    return this.memory.isValidAddress(addr) ? this.memory.read(addr) : 0;
  }

  private advance(op: Opcode): Directive {
    this.pc += opcodeInfo(op).len;
    return 'continue';
  }

  private execute(op: Opcode): Directive {
    switch (op) {
      case Opcode.HLT:
        this.pc += 1;
        return 'halt';
      case Opcode.LDI:
        this.registers.set(this.operand(1), this.operand(2));
        return this.advance(op);
      case Opcode.PRN:
        this.output(String(this.registers.get(this.operand(1))));
        return this.advance(op);
      case Opcode.ADD: return this.arith('ADD', op);
      case Opcode.SUB: return this.arith('SUB', op);
      case Opcode.MUL: return this.arith('MUL', op);
      case Opcode.CMP: {
        const a = this.registers.get(this.operand(1));
        const b = this.registers.get(this.operand(2));
        this.registers.setFlags(compare(a, b));
        return this.advance(op);
      }
      case Opcode.PUSH:
        this.stack.push(this.registers.get(this.operand(1)));
        return this.advance(op);
      case Opcode.POP: {
        const reg = this.operand(1);
        // validate the destination before the stack moves
        this.registers.get(reg);
        this.registers.set(reg, this.stack.pop());
        return this.advance(op);
      }
      case Opcode.CALL: {
        const target = this.registers.get(this.operand(1));
        const ret = this.pc + 2;
        // a return address past the top of memory cannot be stored in a byte
        if (ret >= this.memory.size) throw new AddressError(ret, 'stack', this.memory.size);
        this.stack.push(ret);
        this.pc = target;
        return 'continue';
      }
      case Opcode.RET:
        this.pc = this.stack.pop();
        return 'continue';
      case Opcode.JMP:
        return this.jumpIf(true, op);
      case Opcode.JEQ:
        return this.jumpIf((this.registers.flags() & FLAG_EQ) !== 0, op);
      case Opcode.JNE:
        return this.jumpIf((this.registers.flags() & FLAG_EQ) === 0, op);
      default: {
        const unhandled: never = op;
        throw new UnknownOpcodeError(this.pc, unhandled, this.registers.dump());
      }
    }
  }

  private arith(kind: AluOp, op: Opcode): Directive {
    const ra = this.operand(1);
    const rb = this.operand(2);
    this.registers.set(ra, alu(kind, this.registers.get(ra), this.registers.get(rb)));
    return this.advance(op);
  }

  // Jump family: the operand names a register holding the destination
  private jumpIf(taken: boolean, op: Opcode): Directive {
    const target = this.registers.get(this.operand(1));
    if (taken) {
      this.pc = target;
      return 'continue';
    }
    return this.advance(op);
  }
}
