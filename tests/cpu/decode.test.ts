import { describe, it, expect } from 'vitest';
import { decode } from '@core/cpu/decode';

describe('Instruction decoder', () => {
  it('splits a word into its fields', () => {
    expect(decode(0xD123)).toEqual({ opcode: 0xD123, c: 0xD, x: 0x1, y: 0x2, n: 0x3, nn: 0x23, nnn: 0x123 });
  });

  it('agrees with the bit formulas over every 16-bit value', () => {
    for (let w = 0; w <= 0xFFFF; w++) {
      const d = decode(w);
      if (d.c !== ((w >> 12) & 0xF) || d.x !== ((w >> 8) & 0xF) || d.y !== ((w >> 4) & 0xF)
        || d.n !== (w & 0xF) || d.nn !== (w & 0xFF) || d.nnn !== (w & 0xFFF) || d.opcode !== w) {
        throw new Error(`decode mismatch at ${w.toString(16)}`);
      }
    }
    expect(decode(0xFFFF).nnn).toBe(0xFFF);
  });

  it('ignores bits above 16', () => {
    expect(decode(0x1_00E0).opcode).toBe(0x00E0);
  });
});
