import { describe, it, expect } from "vitest";
import { disasmAt, disassemble, formatInstruction, formatTraceLine } from "@utils/disasm";

function reader(bytes: number[]) {
  return (addr: number) => (addr < bytes.length ? bytes[addr] : 0x00);
}

describe("disassembler", () => {
  it("decodes LDI with register and literal operands", () => {
    const d = disasmAt(reader([0x82, 0x00, 0x08]), 0);
    expect(d.mnemonic).toBe("LDI");
    expect(d.operand).toBe("R0,#8");
    expect(d.bytes).toEqual([0x82, 0x00, 0x08]);
    expect(d.len).toBe(3);
    expect(formatInstruction(d)).toBe("LDI R0,#8");
  });

  it("marks unassigned bytes as ??? of length 1", () => {
    const d = disasmAt(reader([0xFF, 0x01, 0x02]), 0);
    expect(d.mnemonic).toBe("???");
    expect(d.len).toBe(1);
    expect(d.bytes).toEqual([0xFF]);
    expect(formatInstruction(d)).toBe("???");
  });

  it("wraps operand reads at the end of memory", () => {
    const seen: number[] = [];
    disasmAt((addr) => { seen.push(addr); return 0x47; }, 255);
    expect(seen).toEqual([255, 0, 1]);
  });

  it("formats a trace line with pc, mnemonic, two bytes and all registers", () => {
    const d = disasmAt(reader([0x82, 0x00, 0x08]), 0);
    expect(formatTraceLine(0, d, [0, 0, 0, 0, 0, 0, 0, 255])).toBe("TRACE: 00 | LDI 00 08 | 00 00 00 00 00 00 00 FF");
  });

  it("lists a whole program", () => {
    expect(disassemble(Uint8Array.from([0x82, 0x00, 0x08, 0x47, 0x00, 0x01]))).toEqual([
      "00: 82 00 08  LDI R0,#8",
      "03: 47 00     PRN R0",
      "05: 01        HLT",
    ]);
  });
});
