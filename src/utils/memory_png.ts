import { PNG } from "pngjs";

export const GRID = 16;

// 256 cells as a 16x16 grayscale grid, cell value = brightness
export function encodeMemoryPng(cells: Uint8Array, opts: { scale?: number } = {}): Buffer {
  const scale = Math.max(1, opts.scale ?? 8) | 0;
  const W = GRID * scale, H = GRID * scale;
  const png = new PNG({ width: W, height: H });
  for (let y = 0; y < GRID; y++) {
    for (let x = 0; x < GRID; x++) {
      const i = y * GRID + x;
      const v = i < cells.length ? cells[i] : 0;
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W;
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + (x * scale + dx)) << 2;
          png.data[o + 0] = v;
          png.data[o + 1] = v;
          png.data[o + 2] = v;
          png.data[o + 3] = 255;
        }
      }
    }
  }
  return PNG.sync.write(png);
}
