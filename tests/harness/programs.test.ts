import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadProgramFile } from '@core/loader/program';
import { runProgram } from '@core/harness/headless';

const programPath = (name: string) => fileURLToPath(new URL(`../../programs/${name}`, import.meta.url));

describe('Bundled programs', () => {
  const cases: [string, string[]][] = [
    ['print8.ls8', ['8']],
    ['mult.ls8', ['72']],
    ['stack.ls8', ['2', '4', '1']],
    ['call.ls8', ['20', '30', '36', '60']],
    ['sctest.ls8', ['1', '2', '3']],
  ];
  for (const [name, expected] of cases) {
    it(`${name} prints ${expected.join(', ')} and halts`, () => {
      const res = runProgram(loadProgramFile(programPath(name)));
      expect(res.reason).toBe('halt');
      expect(res.output).toEqual(expected);
      // stack balanced on exit
      expect(res.registers[7]).toBe(255);
    });
  }
});
