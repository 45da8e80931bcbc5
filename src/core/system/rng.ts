import { randomBytes } from 'node:crypto';
import type { Byte } from '@core/cpu/types';

export interface RandomSource {
  nextByte(): Byte; // uniform in [0, 256)
}

// mulberry32: small deterministic 32-bit generator, reproducible for a given seed
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(public readonly seed: number) {
    this.state = seed >>> 0;
  }

  nextU32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  nextByte(): Byte {
    return this.nextU32() >>> 24;
  }
}

export function randomSeed(): number {
  return randomBytes(4).readUInt32LE(0);
}
