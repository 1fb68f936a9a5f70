import fs from 'node:fs';
import { MEMORY_SIZE } from '@core/cpu/types';
import { LoadError } from '@core/cpu/errors';

const BINARY_LITERAL = /^[01]{1,8}$/;

// One byte per line, written as a binary literal; '#' starts a comment.
export function parseProgram(text: string): Uint8Array {
  const out: number[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/#.*/, '').trim();
    if (line === '') continue;
    if (!BINARY_LITERAL.test(line)) {
      throw new LoadError(`not a binary byte literal: "${line}"`, i + 1);
    }
    if (out.length >= MEMORY_SIZE) {
      throw new LoadError(`program exceeds ${MEMORY_SIZE} bytes`, i + 1);
    }
    out.push(parseInt(line, 2));
  }
  return Uint8Array.from(out);
}

export function loadProgramFile(path: string): Uint8Array {
  let text: string;
  try {
    text = fs.readFileSync(path, 'utf-8');
  } catch (e) {
    throw new LoadError(`cannot read ${path}: ${(e instanceof Error ? e.message : String(e))}`);
  }
  return parseProgram(text);
}

// Inverse of parseProgram
export function formatProgram(bytes: Uint8Array, comments: (string | null)[] = []): string {
  const lines: string[] = [];
  bytes.forEach((b, i) => {
    const bin = b.toString(2).padStart(8, '0');
    const c = comments[i];
    lines.push(c ? `${bin} # ${c}` : bin);
  });
  return lines.join('\n') + '\n';
}
