import type { Byte } from './types';
import type { Memory } from '@core/bus/memory';
import type { RegisterFile } from './registers';

// Descending stack in main memory. SP points at the last pushed value; 255 = empty.
export class Stack {
  constructor(private memory: Memory, private registers: RegisterFile) {}

  push(value: Byte): void {
    const sp = this.registers.stackPointer() - 1;
    // sp = -1 on overflow: the write raises before SP is updated
    this.memory.write(sp, value);
    this.registers.setStackPointer(sp);
  }

  pop(): Byte {
    const sp = this.registers.stackPointer();
    const value = this.memory.read(sp);
    const next = sp + 1;
    // Popping the slot at the top of memory leaves SP outside RAM
    this.memory.assertAddress(next, 'stack');
    this.registers.setStackPointer(next);
    return value;
  }

  depth(): number {
    return (this.memory.size - 1) - this.registers.stackPointer();
  }
}
