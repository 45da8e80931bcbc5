import type { Memory } from '@core/bus/memory';
import type { Framebuffer } from '@core/display/framebuffer';
import type { Keypad } from '@core/input/keypad';
import type { QuirkProfile } from '@core/system/quirks';
import type { RandomSource } from '@core/system/rng';
import type { CallStack } from './stack';
import type { Registers } from './registers';
import type { Instruction, Word } from './types';
import { VF } from './registers';
import { StackOverflowError, StackUnderflowError } from './errors';

// Machine state an instruction may touch
export interface ExecContext {
  readonly registers: Registers;
  readonly memory: Memory;
  readonly stack: CallStack;
  readonly keypad: Keypad;
  readonly framebuffer: Framebuffer;
  readonly random: RandomSource;
  readonly profile: QuirkProfile;
  fontAddress(digit: number): Word;
  // Fx0A with no key down: re-run the same instruction next cycle
  waitForKey(): void;
}

export type Executor = (ctx: ExecContext, ins: Instruction, at: Word) => void;

export interface OpDef {
  c: number;
  d: number; // class-specific discriminant, see discriminant()
  pattern: string;
  format: (ins: Instruction) => string;
  exec: Executor;
}

// Which field separates instructions sharing a class
export function discriminant(ins: Instruction): number {
  switch (ins.c) {
    case 0x0: return ins.nnn;
    case 0x5: case 0x8: case 0x9: return ins.n;
    case 0xE: case 0xF: return ins.nn;
    default: return 0;
  }
}

const key = (c: number, d: number): number => (c << 12) | d;

const hex = (v: number, width: number): string => `0x${v.toString(16).toUpperCase().padStart(width, '0')}`;
const vr = (r: number): string => `V${r.toString(16).toUpperCase()}`;

const skipIf = (ctx: ExecContext, cond: boolean) => { if (cond) ctx.registers.pc += 2; };

export const OPS: readonly OpDef[] = [
  {
    c: 0x0, d: 0x0E0, pattern: '00E0', format: () => 'CLS',
    exec: (ctx) => ctx.framebuffer.clear(),
  },
  {
    c: 0x0, d: 0x0EE, pattern: '00EE', format: () => 'RET',
    exec: (ctx, _ins, at) => {
      const r = ctx.registers;
      if (r.sp === 0) throw new StackUnderflowError(at);
      r.sp -= 1;
      r.pc = ctx.stack.get(r.sp);
    },
  },
  {
    c: 0x1, d: 0, pattern: '1nnn', format: (i) => `JP ${hex(i.nnn, 3)}`,
    exec: (ctx, i) => { ctx.registers.pc = i.nnn; },
  },
  {
    c: 0x2, d: 0, pattern: '2nnn', format: (i) => `CALL ${hex(i.nnn, 3)}`,
    exec: (ctx, i, at) => {
      const r = ctx.registers;
      if (r.sp >= ctx.stack.capacity) throw new StackOverflowError(at, ctx.stack.capacity);
      ctx.stack.set(r.sp, r.pc);
      r.sp += 1;
      r.pc = i.nnn;
    },
  },
  {
    c: 0x3, d: 0, pattern: '3xnn', format: (i) => `SE ${vr(i.x)}, ${hex(i.nn, 2)}`,
    exec: (ctx, i) => skipIf(ctx, ctx.registers.getV(i.x) === i.nn),
  },
  {
    c: 0x4, d: 0, pattern: '4xnn', format: (i) => `SNE ${vr(i.x)}, ${hex(i.nn, 2)}`,
    exec: (ctx, i) => skipIf(ctx, ctx.registers.getV(i.x) !== i.nn),
  },
  {
    c: 0x5, d: 0x0, pattern: '5xy0', format: (i) => `SE ${vr(i.x)}, ${vr(i.y)}`,
    exec: (ctx, i) => skipIf(ctx, ctx.registers.getV(i.x) === ctx.registers.getV(i.y)),
  },
  {
    c: 0x6, d: 0, pattern: '6xnn', format: (i) => `LD ${vr(i.x)}, ${hex(i.nn, 2)}`,
    exec: (ctx, i) => ctx.registers.setV(i.x, i.nn),
  },
  {
    c: 0x7, d: 0, pattern: '7xnn', format: (i) => `ADD ${vr(i.x)}, ${hex(i.nn, 2)}`,
    exec: (ctx, i) => ctx.registers.setV(i.x, ctx.registers.getV(i.x) + i.nn),
  },
  {
    c: 0x8, d: 0x0, pattern: '8xy0', format: (i) => `LD ${vr(i.x)}, ${vr(i.y)}`,
    exec: (ctx, i) => ctx.registers.setV(i.x, ctx.registers.getV(i.y)),
  },
  {
    c: 0x8, d: 0x1, pattern: '8xy1', format: (i) => `OR ${vr(i.x)}, ${vr(i.y)}`,
    exec: (ctx, i) => ctx.registers.setV(i.x, ctx.registers.getV(i.x) | ctx.registers.getV(i.y)),
  },
  {
    c: 0x8, d: 0x2, pattern: '8xy2', format: (i) => `AND ${vr(i.x)}, ${vr(i.y)}`,
    exec: (ctx, i) => ctx.registers.setV(i.x, ctx.registers.getV(i.x) & ctx.registers.getV(i.y)),
  },
  {
    c: 0x8, d: 0x3, pattern: '8xy3', format: (i) => `XOR ${vr(i.x)}, ${vr(i.y)}`,
    exec: (ctx, i) => ctx.registers.setV(i.x, ctx.registers.getV(i.x) ^ ctx.registers.getV(i.y)),
  },
  {
    c: 0x8, d: 0x4, pattern: '8xy4', format: (i) => `ADD ${vr(i.x)}, ${vr(i.y)}`,
    exec: (ctx, i) => {
      const r = ctx.registers;
      const sum = r.getV(i.x) + r.getV(i.y);
      r.setV(i.x, sum);
      r.setV(VF, sum > 0xff ? 1 : 0);
    },
  },
  {
    c: 0x8, d: 0x5, pattern: '8xy5', format: (i) => `SUB ${vr(i.x)}, ${vr(i.y)}`,
    exec: (ctx, i) => {
      const r = ctx.registers;
      const vx = r.getV(i.x), vy = r.getV(i.y);
      r.setV(i.x, vx - vy);
      r.setV(VF, vx >= vy ? 1 : 0);
    },
  },
  {
    c: 0x8, d: 0x6, pattern: '8xy6', format: (i) => `SHR ${vr(i.x)}, ${vr(i.y)}`,
    exec: (ctx, i) => {
      const r = ctx.registers;
      const src = ctx.profile.shrCopiesVy ? r.getV(i.y) : r.getV(i.x);
      r.setV(i.x, src >>> 1);
      r.setV(VF, src & 0x01);
    },
  },
  {
    c: 0x8, d: 0x7, pattern: '8xy7', format: (i) => `SUBN ${vr(i.x)}, ${vr(i.y)}`,
    exec: (ctx, i) => {
      const r = ctx.registers;
      const vx = r.getV(i.x), vy = r.getV(i.y);
      r.setV(i.x, vy - vx);
      r.setV(VF, vy >= vx ? 1 : 0);
    },
  },
  {
    c: 0x8, d: 0xE, pattern: '8xyE', format: (i) => `SHL ${vr(i.x)}, ${vr(i.y)}`,
    exec: (ctx, i) => {
      const r = ctx.registers;
      const src = ctx.profile.shlCopiesVy ? r.getV(i.y) : r.getV(i.x);
      r.setV(i.x, src << 1);
      r.setV(VF, (src & 0x80) !== 0 ? 1 : 0);
    },
  },
  {
    c: 0x9, d: 0x0, pattern: '9xy0', format: (i) => `SNE ${vr(i.x)}, ${vr(i.y)}`,
    exec: (ctx, i) => skipIf(ctx, ctx.registers.getV(i.x) !== ctx.registers.getV(i.y)),
  },
  {
    c: 0xA, d: 0, pattern: 'Annn', format: (i) => `LD I, ${hex(i.nnn, 3)}`,
    exec: (ctx, i) => { ctx.registers.i = i.nnn; },
  },
  {
    c: 0xB, d: 0, pattern: 'Bnnn', format: (i) => `JP V0, ${hex(i.nnn, 3)}`,
    exec: (ctx, i) => { ctx.registers.pc = ctx.registers.getV(0) + i.nnn; },
  },
  {
    c: 0xC, d: 0, pattern: 'Cxnn', format: (i) => `RND ${vr(i.x)}, ${hex(i.nn, 2)}`,
    exec: (ctx, i) => ctx.registers.setV(i.x, ctx.random.nextByte() & i.nn),
  },
  {
    c: 0xD, d: 0, pattern: 'Dxyn', format: (i) => `DRW ${vr(i.x)}, ${vr(i.y)}, ${hex(i.n, 1)}`,
    exec: (ctx, i) => {
      const r = ctx.registers;
      const sprite = ctx.memory.slice(r.i, i.n);
      const collision = ctx.framebuffer.drawSprite(sprite, r.getV(i.x), r.getV(i.y));
      r.setV(VF, collision ? 1 : 0);
    },
  },
  {
    c: 0xE, d: 0x9E, pattern: 'Ex9E', format: (i) => `SKP ${vr(i.x)}`,
    exec: (ctx, i) => skipIf(ctx, ctx.keypad.isPressed(ctx.registers.getV(i.x) & 0xf)),
  },
  {
    c: 0xE, d: 0xA1, pattern: 'ExA1', format: (i) => `SKNP ${vr(i.x)}`,
    exec: (ctx, i) => skipIf(ctx, !ctx.keypad.isPressed(ctx.registers.getV(i.x) & 0xf)),
  },
  {
    c: 0xF, d: 0x07, pattern: 'Fx07', format: (i) => `LD ${vr(i.x)}, DT`,
    exec: (ctx, i) => ctx.registers.setV(i.x, ctx.registers.dt),
  },
  {
    c: 0xF, d: 0x0A, pattern: 'Fx0A', format: (i) => `LD ${vr(i.x)}, K`,
    exec: (ctx, i) => {
      const k = ctx.keypad.firstPressed();
      if (k === null) ctx.waitForKey();
      else ctx.registers.setV(i.x, k);
    },
  },
  {
    c: 0xF, d: 0x15, pattern: 'Fx15', format: (i) => `LD DT, ${vr(i.x)}`,
    exec: (ctx, i) => { ctx.registers.dt = ctx.registers.getV(i.x); },
  },
  {
    c: 0xF, d: 0x18, pattern: 'Fx18', format: (i) => `LD ST, ${vr(i.x)}`,
    exec: (ctx, i) => { ctx.registers.st = ctx.registers.getV(i.x); },
  },
  {
    c: 0xF, d: 0x1E, pattern: 'Fx1E', format: (i) => `ADD I, ${vr(i.x)}`,
    exec: (ctx, i) => { ctx.registers.i += ctx.registers.getV(i.x); },
  },
  {
    c: 0xF, d: 0x29, pattern: 'Fx29', format: (i) => `LD F, ${vr(i.x)}`,
    exec: (ctx, i) => { ctx.registers.i = ctx.fontAddress(ctx.registers.getV(i.x) & 0xf); },
  },
  {
    c: 0xF, d: 0x33, pattern: 'Fx33', format: (i) => `LD B, ${vr(i.x)}`,
    exec: (ctx, i) => {
      const v = ctx.registers.getV(i.x);
      ctx.memory.loadBytes(ctx.registers.i, [Math.floor(v / 100), Math.floor(v / 10) % 10, v % 10]);
    },
  },
  {
    c: 0xF, d: 0x55, pattern: 'Fx55', format: (i) => `LD [I], ${vr(i.x)}`,
    exec: (ctx, i) => {
      const r = ctx.registers;
      const values: number[] = [];
      for (let k = 0; k <= i.x; k++) values.push(r.getV(k));
      ctx.memory.loadBytes(r.i, values);
      if (ctx.profile.storeDumpAdvancesI) r.i += i.x + 1;
    },
  },
  {
    c: 0xF, d: 0x65, pattern: 'Fx65', format: (i) => `LD ${vr(i.x)}, [I]`,
    exec: (ctx, i) => {
      const r = ctx.registers;
      // read the whole block before touching any register
      const bytes = ctx.memory.slice(r.i, i.x + 1);
      bytes.forEach((b, k) => r.setV(k, b));
      if (ctx.profile.storeLoadAdvancesI) r.i += i.x + 1;
    },
  },
];

const TABLE = new Map<number, OpDef>();
for (const op of OPS) {
  const k = key(op.c, op.d);
  if (TABLE.has(k)) throw new Error(`Duplicate opcode table entry ${op.pattern}`);
  TABLE.set(k, op);
}

export function lookup(ins: Instruction): OpDef | undefined {
  return TABLE.get(key(ins.c, discriminant(ins)));
}
