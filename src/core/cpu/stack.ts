import type { Word } from './types';

export const STACK_SIZE = 16;

// Return-address slots. Depth is tracked by the SP register; range checks happen at CALL/RET.
export class CallStack {
  private readonly slots: Uint16Array;

  constructor(public readonly capacity = STACK_SIZE) {
    this.slots = new Uint16Array(capacity);
  }

  get(index: number): Word { return this.slots[index]; }
  set(index: number, addr: Word) { this.slots[index] = addr & 0xffff; }

  // Entries 0..depth-1, oldest first
  frames(depth: number): Word[] {
    return Array.from(this.slots.subarray(0, Math.min(depth, this.capacity)));
  }
}
