import type { Frame } from '@core/display/framebuffer';
import { crc32 } from './crc32';

// One bracketed line per row, '*' for lit pixels
export function frameToAscii(frame: Frame): string[] {
  return frame.map((row) => `[${row.map((p) => (p ? '*' : ' ')).join('')}]`);
}

export function frameToBytes(frame: Frame): Uint8Array {
  const h = frame.length;
  const w = h > 0 ? frame[0].length : 0;
  const out = new Uint8Array(w * h);
  for (let y = 0; y < h; y++) out.set(frame[y], y * w);
  return out;
}

export function frameCrc32(frame: Frame): number {
  return crc32(frameToBytes(frame));
}
