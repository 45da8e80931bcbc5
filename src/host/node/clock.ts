// 60 Hz from a millisecond clock: frames last 17, 17, 16 ms in turn (50 ms per 3 frames)
export const FRAME_INTERVALS_MS: readonly number[] = [17, 17, 16];

export class FrameClock {
  private last: number;
  private idx = 0;
  private _frames = 0;

  constructor(startMs: number) {
    this.last = startMs;
  }

  get frames(): number { return this._frames; }

  // True when the current interval has elapsed; the next interval starts at `nowMs`
  poll(nowMs: number): boolean {
    if (nowMs - this.last < FRAME_INTERVALS_MS[this.idx]) return false;
    this.last = nowMs;
    this.idx = (this.idx + 1) % FRAME_INTERVALS_MS.length;
    this._frames++;
    return true;
  }

  // Milliseconds until the next frame boundary (0 if already due)
  untilNext(nowMs: number): number {
    return Math.max(0, this.last + FRAME_INTERVALS_MS[this.idx] - nowMs);
  }
}
