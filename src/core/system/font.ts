import type { Memory } from '@core/bus/memory';
import type { Word } from '@core/cpu/types';

export const FONT_BASE = 0x000;

// Hex digit glyphs, 4 pixels wide in the high nibble
export const FONT: ReadonlyArray<readonly number[]> = [
  [0x60, 0x90, 0x90, 0x90, 0x60], // 0
  [0x20, 0x60, 0x20, 0x20, 0x70], // 1
  [0xF0, 0x10, 0xF0, 0x80, 0xF0], // 2
  [0xE0, 0x10, 0xE0, 0x10, 0xE0], // 3
  [0x90, 0x90, 0xF0, 0x10, 0x10], // 4
  [0xF0, 0x80, 0xE0, 0x10, 0xE0], // 5
  [0x70, 0x80, 0xE0, 0x90, 0xE0], // 6
  [0xF0, 0x10, 0x20, 0x40, 0x40], // 7
  [0x60, 0x90, 0x60, 0x90, 0x60], // 8
  [0x60, 0x90, 0x70, 0x10, 0xE0], // 9
  [0x60, 0x90, 0xF0, 0x90, 0x90], // A
  [0xE0, 0x90, 0xE0, 0x90, 0xE0], // B
  [0x70, 0x80, 0x80, 0x80, 0x70], // C
  [0xE0, 0x90, 0x90, 0x90, 0xE0], // D
  [0xF0, 0x80, 0xF0, 0x80, 0xF0], // E
  [0xF0, 0x80, 0xF0, 0x80, 0x80], // F
];

// Writes all glyphs back to back and returns each glyph's address
export function loadFont(mem: Memory, base: Word = FONT_BASE): Word[] {
  const addrs: Word[] = [];
  let addr = base;
  for (const glyph of FONT) {
    addrs.push(addr);
    addr = mem.loadBytes(addr, glyph);
  }
  return addrs;
}
