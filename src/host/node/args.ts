import { PROGRAM_START } from '@core/bus/memory';
import { parseQuirkOverrides, resolveProfile, withQuirks, type QuirkProfile } from '@core/system/quirks';
import { parseHeldKeys } from './keymap';
import { getEnv, parseNum } from '@utils/env';

export interface CliArgs {
  rom: string;
  profile: QuirkProfile;
  seed?: number;
  frames: number;
  cyclesPerFrame: number;
  start: number;
  max: number;
  heldKeys: number[];
  png: string | null;
  scale: number;
  ascii: boolean;
  realtime: boolean;
}

// --name=value arguments override the environment
export function parseArgs(argv: string[]): CliArgs {
  const opts = new Map<string, string>();
  const flags = new Set<string>();
  for (const a of argv) {
    if (!a.startsWith('--')) continue;
    const eq = a.indexOf('=');
    if (eq > 0) opts.set(a.slice(2, eq), a.slice(eq + 1));
    else flags.add(a.slice(2));
  }
  const pick = (name: string, env: string | null = null): string | null => opts.get(name) ?? (env ? getEnv(env) : null);

  const base = resolveProfile(pick('profile', 'CHIP8_PROFILE') ?? 'modern');
  const quirks = pick('quirks', 'CHIP8_QUIRKS');
  const profile = quirks ? withQuirks(base, parseQuirkOverrides(quirks)) : base;
  const seed = parseNum(pick('seed', 'CHIP8_SEED'));

  return {
    rom: pick('rom', 'ROM') ?? 'roms/ibm.ch8',
    profile,
    seed: seed === null ? undefined : seed,
    frames: parseNum(pick('frames')) ?? 120,
    cyclesPerFrame: parseNum(pick('cycles-per-frame')) ?? 16,
    start: parseNum(pick('start')) ?? PROGRAM_START,
    max: parseNum(pick('max')) ?? 0,
    heldKeys: parseHeldKeys(pick('hold') ?? ''),
    png: pick('png'),
    scale: parseNum(pick('scale')) ?? 8,
    ascii: flags.has('ascii'),
    realtime: flags.has('realtime'),
  };
}
