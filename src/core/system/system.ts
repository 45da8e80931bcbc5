import { Memory, PROGRAM_START, RAM_SIZE } from '@core/bus/memory';
import { decode } from '@core/cpu/decode';
import { AddressOutOfRangeError, UnknownOpcodeError } from '@core/cpu/errors';
import { lookup, type ExecContext } from '@core/cpu/ops';
import { Registers } from '@core/cpu/registers';
import { CallStack } from '@core/cpu/stack';
import type { Instruction, Word } from '@core/cpu/types';
import { DISPLAY_HEIGHT, DISPLAY_WIDTH, Framebuffer, type Frame } from '@core/display/framebuffer';
import { Keypad } from '@core/input/keypad';
import { getEnv } from '@utils/env';
import { createTracer, type TraceOptions, type Tracer } from '@utils/trace';
import { loadFont } from './font';
import { PROFILES, type QuirkProfile } from './quirks';
import { randomSeed, SeededRandom, type RandomSource } from './rng';

export interface Chip8Options {
  profile?: QuirkProfile;
  // Fixed RNG seed; drawn from OS entropy when omitted
  seed?: number;
  // Replaces the seeded generator entirely (seed is then null)
  random?: RandomSource;
  memorySize?: number;
  width?: number;
  height?: number;
  // Byte written to all of memory before the font; defaults to CHIP8_RAM_INIT (hex)
  ramInit?: number;
  trace?: TraceOptions;
}

const hex4 = (v: number): string => `0x${v.toString(16).padStart(4, '0')}`;

function envRamInit(): number | undefined {
  const s = getEnv('CHIP8_RAM_INIT');
  if (s === null) return undefined;
  const v = parseInt(s, 16);
  return Number.isFinite(v) ? v & 0xff : undefined;
}

export class Chip8System implements ExecContext {
  readonly registers = new Registers();
  readonly stack = new CallStack();
  readonly keypad = new Keypad();
  readonly memory: Memory;
  readonly framebuffer: Framebuffer;
  readonly random: RandomSource;
  readonly profile: QuirkProfile;
  readonly seed: number | null;
  private readonly fontAddrs: Word[];
  private readonly trace: Tracer;
  private awaitingKey = false;
  private _cycles = 0;

  constructor(opts: Chip8Options = {}) {
    this.profile = opts.profile ?? PROFILES.modern;
    this.memory = new Memory(opts.memorySize ?? RAM_SIZE);
    this.framebuffer = new Framebuffer(opts.width ?? DISPLAY_WIDTH, opts.height ?? DISPLAY_HEIGHT);
    if (opts.random) {
      this.random = opts.random;
      this.seed = null;
    } else {
      this.seed = (opts.seed ?? randomSeed()) >>> 0;
      this.random = new SeededRandom(this.seed);
    }
    const fill = opts.ramInit ?? envRamInit();
    if (fill !== undefined) this.memory.fill(fill);
    this.fontAddrs = loadFont(this.memory);
    this.trace = createTracer(opts.trace);
  }

  get cycles(): number { return this._cycles; }

  fontAddress(digit: number): Word {
    return this.fontAddrs[digit & 0xf];
  }

  waitForKey(): void {
    this.registers.pc -= 2;
    this.awaitingKey = true;
  }

  // True while the last executed instruction was an Fx0A still waiting for a key
  isAwaitingKey(): boolean { return this.awaitingKey; }

  keyPress(key: number): void {
    this.keypad.press(key);
    this.trace('keys', () => `press ${key.toString(16).toUpperCase()}`);
  }

  keyUnpress(key: number): void {
    this.keypad.release(key);
    this.trace('keys', () => `unpress ${key.toString(16).toUpperCase()}`);
  }

  setPc(addr: Word): void {
    this.registers.pc = addr;
  }

  // Stores the image as big-endian words from `start`; returns the next free address.
  // An odd trailing byte is written on its own.
  loadRom(rom: Uint8Array, start: Word = PROGRAM_START): number {
    const end = start + rom.length;
    if (!Number.isInteger(start) || start < 0 || end > this.memory.size) {
      throw new AddressOutOfRangeError(start < 0 ? start : Math.max(start, end - 1), this.memory.size);
    }
    const words: number[] = [];
    for (let k = 0; k + 1 < rom.length; k += 2) words.push((rom[k] << 8) | rom[k + 1]);
    let next = this.memory.loadWords(start, words);
    if (rom.length % 2 === 1) next = this.memory.loadBytes(next, [rom[rom.length - 1]]);
    this.trace('rom', () => `loaded ${rom.length} bytes at ${hex4(start)}..${hex4(next)}`);
    return next;
  }

  // Execute one instruction. PC is advanced past it before the handler runs.
  cycle(): Instruction {
    const r = this.registers;
    const at = r.pc;
    const ins = decode(this.memory.readU16(at));
    r.pc = at + 2;
    this.awaitingKey = false;
    const op = lookup(ins);
    if (!op) throw new UnknownOpcodeError(ins.opcode, at);
    this.trace('cpu', () => `[PC:${hex4(at)}] ${op.format(ins)}`);
    op.exec(this, ins, at);
    this._cycles++;
    return ins;
  }

  // Called once per displayed frame (~60 Hz)
  cycleTimers(): void {
    const r = this.registers;
    if (r.dt > 0) r.dt -= 1;
    if (r.st > 0) r.st -= 1;
    this.trace('timers', () => `dt=${r.dt} st=${r.st}`);
  }

  isSoundOn(): boolean {
    return this.registers.st > 0;
  }

  getFrame(): Frame {
    return this.framebuffer.getFrame();
  }
}
