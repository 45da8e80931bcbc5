import type { Instruction, Word } from './types';

// Total over all 16-bit values; higher bits of the input are ignored.
export function decode(word: Word): Instruction {
  const opcode = word & 0xffff;
  return {
    opcode,
    c: (opcode >>> 12) & 0xf,
    x: (opcode >>> 8) & 0xf,
    y: (opcode >>> 4) & 0xf,
    n: opcode & 0xf,
    nn: opcode & 0xff,
    nnn: opcode & 0xfff,
  };
}
