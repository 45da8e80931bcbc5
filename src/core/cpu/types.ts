export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Nibble = number; // 0..15

// Decoded fields of one 16-bit instruction word
export interface Instruction {
  opcode: Word;
  c: Nibble; // bits 15..12, instruction class
  x: Nibble; // bits 11..8
  y: Nibble; // bits 7..4
  n: Nibble; // bits 3..0
  nn: Byte; // bits 7..0
  nnn: Word; // bits 11..0
}

export interface CPUState {
  v: Byte[]; // V0..VF
  i: Word;
  dt: Byte;
  st: Byte;
  pc: Word;
  sp: Byte;
}
