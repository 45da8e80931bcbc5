import type { CPUState, Word } from '@core/cpu/types';
import { decode } from '@core/cpu/decode';
import { lookup } from '@core/cpu/ops';

export type ReadWordFn = (addr: Word) => Word;

export interface Disasm {
  pc: Word;
  opcode: Word;
  text: string; // '???' when the word is not an instruction
}

const h4 = (v: number): string => v.toString(16).toUpperCase().padStart(4, '0');
const h2 = (v: number): string => v.toString(16).toUpperCase().padStart(2, '0');

export function disassemble(word: Word): string {
  const ins = decode(word);
  const op = lookup(ins);
  return op ? op.format(ins) : '???';
}

export function disasmAt(read: ReadWordFn, pc: Word): Disasm {
  const opcode = read(pc) & 0xffff;
  return { pc, opcode, text: disassemble(opcode) };
}

// "0200  6222  LD V2, 0x22            V0=00 ... VF=00 I=0000 SP=0 DT=00 ST=00"
export function formatTraceLine(d: Disasm, s: CPUState): string {
  const regs = s.v.map((v, k) => `V${k.toString(16).toUpperCase()}=${h2(v)}`).join(' ');
  return `${h4(d.pc)}  ${h4(d.opcode)}  ${d.text.padEnd(20, ' ')}  ${regs} I=${h4(s.i)} SP=${s.sp} DT=${h2(s.dt)} ST=${h2(s.st)}`;
}
