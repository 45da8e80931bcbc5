import type { Byte, Word } from '@core/cpu/types';
import { AddressOutOfRangeError } from '@core/cpu/errors';

export const RAM_SIZE = 0x1000; // 4KB
export const PROGRAM_START = 0x200;

// Flat byte-addressable store for code and data. Accesses outside [0, size) throw.
export class Memory {
  private readonly ram: Uint8Array;

  constructor(size = RAM_SIZE) {
    this.ram = new Uint8Array(size);
  }

  get size(): number { return this.ram.length; }

  private check(addr: number, width = 1): number {
    if (!Number.isInteger(addr) || addr < 0 || addr + width > this.ram.length) {
      throw new AddressOutOfRangeError(addr, this.ram.length);
    }
    return addr;
  }

  readU8(addr: number): Byte {
    return this.ram[this.check(addr)];
  }

  writeU8(addr: number, value: number): void {
    this.ram[this.check(addr)] = value & 0xff;
  }

  // Big-endian
  readU16(addr: number): Word {
    const a = this.check(addr, 2);
    return (this.ram[a] << 8) | this.ram[a + 1];
  }

  writeU16(addr: number, value: number): void {
    const a = this.check(addr, 2);
    this.ram[a] = (value >>> 8) & 0xff;
    this.ram[a + 1] = value & 0xff;
  }

  // Returns the next free address after the block
  loadBytes(addr: number, bytes: ArrayLike<number>): number {
    if (bytes.length === 0) return this.check(addr, 0);
    this.check(addr, bytes.length);
    for (let k = 0; k < bytes.length; k++) this.ram[addr + k] = bytes[k] & 0xff;
    return addr + bytes.length;
  }

  loadWords(addr: number, words: ArrayLike<number>): number {
    if (words.length === 0) return this.check(addr, 0);
    this.check(addr, words.length * 2);
    let a = addr;
    for (let k = 0; k < words.length; k++) {
      this.writeU16(a, words[k]);
      a += 2;
    }
    return a;
  }

  slice(addr: number, length: number): Uint8Array {
    if (length <= 0) return new Uint8Array(0);
    this.check(addr, length);
    return this.ram.slice(addr, addr + length);
  }

  fill(value: number): void {
    this.ram.fill(value & 0xff);
  }
}
