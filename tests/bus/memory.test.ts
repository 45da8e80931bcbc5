import { describe, it, expect } from 'vitest';
import { Memory, RAM_SIZE } from '@core/bus/memory';
import { AddressOutOfRangeError } from '@core/cpu/errors';

describe('Memory', () => {
  it('is 4KB of zeros when created', () => {
    const mem = new Memory();
    expect(mem.size).toBe(RAM_SIZE);
    expect(mem.slice(0, RAM_SIZE).every((b) => b === 0)).toBe(true);
  });

  it('reads back bytes it wrote', () => {
    const mem = new Memory();
    mem.writeU8(0x0, 0x00);
    mem.writeU8(0x1, 0x10);
    mem.writeU8(0xFF1, 0x1FF);
    expect(mem.readU8(0x1)).toBe(0x10);
    expect(mem.readU8(0xFF1)).toBe(0xFF);
  });

  it('stores 16-bit words big-endian', () => {
    const mem = new Memory();
    mem.writeU16(0x0, 0x1122);
    mem.writeU16(0x2, 0x3344);
    expect(mem.readU16(0x0)).toBe(0x1122);
    expect(mem.readU16(0x2)).toBe(0x3344);
    expect([mem.readU8(0), mem.readU8(1), mem.readU8(2), mem.readU8(3)]).toEqual([0x11, 0x22, 0x33, 0x44]);
  });

  it('loads blocks and returns the next free address', () => {
    const mem = new Memory();
    expect(mem.loadWords(0x200, [0x1122, 0x3344, 0x5566])).toBe(0x206);
    expect(mem.readU16(0x204)).toBe(0x5566);
    expect(mem.loadBytes(0x300, [0x11, 0x22, 0x33])).toBe(0x303);
    expect(Array.from(mem.slice(0x300, 3))).toEqual([0x11, 0x22, 0x33]);
  });

  it('rejects addresses outside the array', () => {
    const mem = new Memory();
    expect(() => mem.readU8(0x1000)).toThrow(AddressOutOfRangeError);
    expect(() => mem.readU8(-1)).toThrow(AddressOutOfRangeError);
    expect(() => mem.readU16(0xFFF)).toThrow(AddressOutOfRangeError);
    expect(() => mem.writeU8(0x1000, 1)).toThrow(AddressOutOfRangeError);
    expect(() => mem.slice(0xFFE, 3)).toThrow(AddressOutOfRangeError);
  });

  it('writes nothing when a block does not fit', () => {
    const mem = new Memory();
    expect(() => mem.loadBytes(0xFFE, [1, 2, 3])).toThrow(AddressOutOfRangeError);
    expect(mem.readU8(0xFFE)).toBe(0);
    expect(() => mem.loadWords(0xFFE, [0x0102, 0x0304])).toThrow(AddressOutOfRangeError);
    expect(mem.readU8(0xFFE)).toBe(0);
  });

  it('carries the address and capacity in the error', () => {
    const mem = new Memory(0x100);
    let err: unknown = null;
    try { mem.readU8(0x100); } catch (e) { err = e; }
    expect(err).toBeInstanceOf(AddressOutOfRangeError);
    if (!(err instanceof AddressOutOfRangeError)) return;
    expect(err.address).toBe(0x100);
    expect(err.capacity).toBe(0x100);
    expect(err.message).toBe('Address 0x0100 outside memory of 256 bytes');
  });

  it('slice returns a copy', () => {
    const mem = new Memory();
    const s = mem.slice(0, 2);
    s[0] = 0xAA;
    expect(mem.readU8(0)).toBe(0);
  });
});
