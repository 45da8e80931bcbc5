import { describe, it, expect } from 'vitest';
import { runFrames, runRom } from '@core/harness/headless';
import { Chip8System } from '@core/system/system';
import { frameCrc32 } from '@utils/frame';

// LD V0,5; LD F,V0; LD V1,10; LD V2,4; DRW V1,V2,5; JP 0x20A
const DRAW_FIVE = new Uint8Array([0x60, 0x05, 0xF0, 0x29, 0x61, 0x0A, 0x62, 0x04, 0xD1, 0x25, 0x12, 0x0A]);

const lit = (frame: ReadonlyArray<ReadonlyArray<number>>): number => frame.reduce((n, row) => n + row.filter((p) => p).length, 0);

describe('Headless runner', () => {
  it('runs a ROM for a fixed number of frames', () => {
    const res = runRom(DRAW_FIVE, { frames: 3, cyclesPerFrame: 4, seed: 1 });
    expect(res.reason).toBe('completed');
    expect(res.cycles).toBe(12);
    expect(res.frames).toBe(3);
    expect(res.frame[4].slice(10, 14)).toEqual([1, 1, 1, 1]);
    expect(res.frame[5].slice(10, 14)).toEqual([1, 0, 0, 0]);
    expect(lit(res.frame)).toBe(12);
    expect(res.crc).toBe(frameCrc32(res.frame));
    expect(res.seed).toBe(1);
  });

  it('is deterministic across runs', () => {
    const a = runRom(DRAW_FIVE, { frames: 2, seed: 9 });
    const b = runRom(DRAW_FIVE, { frames: 2, seed: 9 });
    expect(a.crc).toBe(b.crc);
    expect(a.cycles).toBe(b.cycles);
  });

  it('reports a failing ROM instead of throwing', () => {
    const res = runRom(new Uint8Array([0x00, 0xEE]), { frames: 5, seed: 1 });
    expect(res.reason).toBe('fail');
    expect(res.kind).toBe('stack-underflow');
    expect(res.message).toBe('Return with empty call stack at 0x0200');
    expect(res.cycles).toBe(0);
    expect(res.frames).toBe(0);
  });

  it('counts frames with the sound timer running', () => {
    // LD V0,3; LD ST,V0; JP 0x204
    const rom = new Uint8Array([0x60, 0x03, 0xF0, 0x18, 0x12, 0x04]);
    const res = runRom(rom, { frames: 6, cyclesPerFrame: 2, seed: 1 });
    expect(res.soundFrames).toBe(2);
  });

  it('holds keys for Fx0A', () => {
    // LD V1,K; LD F,V1; DRW V0,V0,5; JP 0x206
    const rom = new Uint8Array([0xF1, 0x0A, 0xF1, 0x29, 0xD0, 0x05, 0x12, 0x06]);
    const held = runRom(rom, { frames: 2, cyclesPerFrame: 4, seed: 1, heldKeys: [0x1] });
    expect(lit(held.frame)).toBe(8);
    const idle = runRom(rom, { frames: 2, cyclesPerFrame: 4, seed: 1 });
    expect(lit(idle.frame)).toBe(0);
  });

  it('runFrames ticks timers once per frame and reports progress', () => {
    const sys = new Chip8System({ seed: 1 });
    sys.loadRom(new Uint8Array([0x12, 0x00]));
    sys.setPc(0x200);
    sys.registers.dt = 10;
    const seen: number[] = [];
    const stats = runFrames(sys, 3, 5, (n) => seen.push(n));
    expect(stats).toEqual({ frames: 3, soundFrames: 0, idleCycles: 12 });
    expect(seen).toEqual([1, 2, 3]);
    expect(sys.registers.dt).toBe(7);
    expect(sys.cycles).toBe(15);
  });
});
