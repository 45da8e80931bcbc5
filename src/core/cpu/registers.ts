import type { Byte, CPUState, Word } from './types';

export const NUM_V_REGS = 16;
export const VF = 0xf;

// V0..VF, I, timers, PC and SP. Every setter masks to the field width.
export class Registers {
  private readonly v = new Uint8Array(NUM_V_REGS);
  private _i: Word = 0;
  private _dt: Byte = 0;
  private _st: Byte = 0;
  private _pc: Word = 0;
  private _sp: Byte = 0;

  getV(x: number): Byte { return this.v[x & 0xf]; }
  setV(x: number, value: number) { this.v[x & 0xf] = value & 0xff; }

  get i(): Word { return this._i; }
  set i(value: number) { this._i = value & 0xffff; }

  get dt(): Byte { return this._dt; }
  set dt(value: number) { this._dt = value & 0xff; }

  get st(): Byte { return this._st; }
  set st(value: number) { this._st = value & 0xff; }

  get pc(): Word { return this._pc; }
  set pc(value: number) { this._pc = value & 0xffff; }

  get sp(): Byte { return this._sp; }
  set sp(value: number) { this._sp = value & 0xff; }

  snapshot(): CPUState {
    return { v: Array.from(this.v), i: this._i, dt: this._dt, st: this._st, pc: this._pc, sp: this._sp };
  }
}
