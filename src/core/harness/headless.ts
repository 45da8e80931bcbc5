import type { Chip8ErrorKind } from '@core/cpu/errors';
import { isChip8Error } from '@core/cpu/errors';
import type { Frame } from '@core/display/framebuffer';
import { Chip8System, type Chip8Options } from '@core/system/system';
import { PROGRAM_START } from '@core/bus/memory';
import { frameCrc32 } from '@utils/frame';

export const DEFAULT_CYCLES_PER_FRAME = 16;

export interface RunOptions extends Chip8Options {
  frames: number;
  cyclesPerFrame?: number;
  start?: number;
  // Keys held down for the whole run
  heldKeys?: number[];
}

export interface RunResult {
  cycles: number;
  frames: number;
  reason: 'completed' | 'fail';
  message?: string;
  kind?: Chip8ErrorKind;
  frame: Frame;
  crc: number;
  soundFrames: number; // frames during which the sound flag was on
  seed: number | null;
}

export interface FrameStats {
  frames: number;
  soundFrames: number;
  // cycles run after the first of each frame, i.e. without a timer tick
  idleCycles: number;
}

// Per frame: tick the timers, sample the sound flag, then run the CPU for the frame's cycles.
export function runFrames(sys: Chip8System, frames: number, cyclesPerFrame = DEFAULT_CYCLES_PER_FRAME, onFrame?: (n: number) => void): FrameStats {
  const stats: FrameStats = { frames: 0, soundFrames: 0, idleCycles: 0 };
  for (let f = 0; f < frames; f++) {
    sys.cycleTimers();
    if (sys.isSoundOn()) stats.soundFrames++;
    for (let c = 0; c < cyclesPerFrame; c++) {
      sys.cycle();
      if (c > 0) stats.idleCycles++;
    }
    stats.frames++;
    onFrame?.(stats.frames);
  }
  return stats;
}

export function runRom(rom: Uint8Array, opts: RunOptions): RunResult {
  const sys = new Chip8System(opts);
  const start = opts.start ?? PROGRAM_START;
  const progress: FrameStats = { frames: 0, soundFrames: 0, idleCycles: 0 };
  const finish = (reason: RunResult['reason'], extra: Pick<RunResult, 'message' | 'kind'> = {}): RunResult => {
    const frame = sys.getFrame();
    return { cycles: sys.cycles, frames: progress.frames, reason, ...extra, frame, crc: frameCrc32(frame), soundFrames: progress.soundFrames, seed: sys.seed };
  };
  try {
    sys.loadRom(rom, start);
    sys.setPc(start);
    for (const k of opts.heldKeys ?? []) sys.keyPress(k);
    for (let f = 0; f < opts.frames; f++) {
      const s = runFrames(sys, 1, opts.cyclesPerFrame);
      progress.frames += s.frames;
      progress.soundFrames += s.soundFrames;
      progress.idleCycles += s.idleCycles;
    }
  } catch (e) {
    if (isChip8Error(e)) return finish('fail', { message: e.message, kind: e.kind });
    throw e;
  }
  return finish('completed');
}
