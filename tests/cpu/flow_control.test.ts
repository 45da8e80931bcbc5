import { describe, it, expect } from 'vitest';
import { StackOverflowError, StackUnderflowError, UnknownOpcodeError, AddressOutOfRangeError } from '@core/cpu/errors';
import { chipWithProgram, runCode } from '../helpers/chip';

describe('Program counter and flow control', () => {
  it('advances PC by 2 per plain instruction', () => {
    const sys = chipWithProgram([0x00E0, 0x00E0]);
    expect(sys.registers.pc).toBe(0x200);
    sys.cycle();
    expect(sys.registers.pc).toBe(0x202);
    sys.cycle();
    expect(sys.registers.pc).toBe(0x204);
    expect(sys.cycles).toBe(2);
  });

  it('JP sets PC', () => {
    expect(runCode([0x1320]).registers.pc).toBe(0x320);
  });

  it('CALL pushes the return address and RET pops it', () => {
    const sys = chipWithProgram([0x2206, 0x00E0, 0x00E0, 0x00EE]);
    sys.cycle();
    expect(sys.registers.pc).toBe(0x206);
    expect(sys.registers.sp).toBe(1);
    expect(sys.stack.get(0)).toBe(0x202);
    sys.cycle();
    expect(sys.registers.pc).toBe(0x202);
    expect(sys.registers.sp).toBe(0);
  });

  it('RET returns to the address at SP - 1', () => {
    const sys = runCode([0x00EE], undefined, (s) => {
      s.registers.sp = 3;
      s.stack.set(3, 0x210);
      s.registers.sp = 4;
    });
    expect(sys.registers.sp).toBe(3);
    expect(sys.registers.pc).toBe(0x210);
  });

  it('RET on an empty stack raises StackUnderflowError', () => {
    const sys = chipWithProgram([0x00EE]);
    expect(() => sys.cycle()).toThrow(StackUnderflowError);
  });

  it('CALL beyond 16 levels raises StackOverflowError', () => {
    const sys = chipWithProgram([0x2200]);
    for (let k = 0; k < 16; k++) sys.cycle();
    expect(sys.registers.sp).toBe(16);
    let err: unknown = null;
    try { sys.cycle(); } catch (e) { err = e; }
    expect(err).toBeInstanceOf(StackOverflowError);
    expect(err instanceof StackOverflowError && err.kind).toBe('stack-overflow');
    expect(sys.registers.sp).toBe(16);
  });

  it('3xnn / 4xnn skip on (in)equality with the immediate', () => {
    const v2 = (s: ReturnType<typeof chipWithProgram>) => s.registers.setV(2, 0x22);
    expect(runCode([0x3222], undefined, v2).registers.pc).toBe(0x204);
    expect(runCode([0x3223], undefined, v2).registers.pc).toBe(0x202);
    expect(runCode([0x4222], undefined, v2).registers.pc).toBe(0x202);
    expect(runCode([0x4223], undefined, v2).registers.pc).toBe(0x204);
  });

  it('5xy0 / 9xy0 compare two registers', () => {
    const same = (s: ReturnType<typeof chipWithProgram>) => { s.registers.setV(2, 0x22); s.registers.setV(3, 0x22); };
    const diff = (s: ReturnType<typeof chipWithProgram>) => { s.registers.setV(2, 0x22); s.registers.setV(3, 0x23); };
    expect(runCode([0x5230], undefined, same).registers.pc).toBe(0x204);
    expect(runCode([0x5230], undefined, diff).registers.pc).toBe(0x202);
    expect(runCode([0x9230], undefined, same).registers.pc).toBe(0x202);
    expect(runCode([0x9230], undefined, diff).registers.pc).toBe(0x204);
  });

  it('Bnnn jumps to V0 + nnn', () => {
    const sys = runCode([0xB300], undefined, (s) => s.registers.setV(0, 0x10));
    expect(sys.registers.pc).toBe(0x310);
  });

  it('Bnnn past the end of memory faults on the next fetch', () => {
    const sys = runCode([0xBFFF], undefined, (s) => s.registers.setV(0, 0xFF));
    expect(sys.registers.pc).toBe(0x10FE);
    expect(() => sys.cycle()).toThrow(AddressOutOfRangeError);
  });
});

describe('Unknown opcodes', () => {
  it.each([0x0123, 0x5231, 0x800F, 0x9231, 0xE000, 0xF0FF])('rejects %s', (word) => {
    const sys = chipWithProgram([word]);
    expect(() => sys.cycle()).toThrow(UnknownOpcodeError);
  });

  it('reports opcode and address', () => {
    const sys = chipWithProgram([0x00E0, 0x0123]);
    sys.cycle();
    let err: unknown = null;
    try { sys.cycle(); } catch (e) { err = e; }
    expect(err).toBeInstanceOf(UnknownOpcodeError);
    if (!(err instanceof UnknownOpcodeError)) return;
    expect(err.opcode).toBe(0x0123);
    expect(err.address).toBe(0x202);
    expect(err.kind).toBe('unknown-opcode');
    expect(err.message).toBe('Unknown opcode: 0x0123 at 0x0202');
    expect(sys.cycles).toBe(1);
  });
});
