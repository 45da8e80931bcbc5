import { UnknownProfileError } from '@core/cpu/errors';

// Toggles for instructions whose behavior differs between the original
// interpreter and later ones.
export interface QuirkProfile {
  readonly shrCopiesVy: boolean; // 8xy6: Vx = Vy before shifting
  readonly shlCopiesVy: boolean; // 8xyE: Vx = Vy before shifting
  readonly storeDumpAdvancesI: boolean; // Fx55: I += x + 1 afterwards
  readonly storeLoadAdvancesI: boolean; // Fx65: I += x + 1 afterwards
}

export type ProfileName = 'original' | 'modern';
export type QuirkName = keyof QuirkProfile;

export const PROFILES: Readonly<Record<ProfileName, QuirkProfile>> = Object.freeze({
  original: Object.freeze({ shrCopiesVy: true, shlCopiesVy: true, storeDumpAdvancesI: true, storeLoadAdvancesI: true }),
  modern: Object.freeze({ shrCopiesVy: false, shlCopiesVy: false, storeDumpAdvancesI: false, storeLoadAdvancesI: false }),
});

// Short names accepted on the command line
const ALIASES: Record<string, QuirkName> = {
  shr: 'shrCopiesVy',
  shl: 'shlCopiesVy',
  dump: 'storeDumpAdvancesI',
  load: 'storeLoadAdvancesI',
  shrcopiesvy: 'shrCopiesVy',
  shlcopiesvy: 'shlCopiesVy',
  storedumpadvancesi: 'storeDumpAdvancesI',
  storeloadadvancesi: 'storeLoadAdvancesI',
};

export function resolveProfile(name: string): QuirkProfile {
  const key = name.trim().toLowerCase();
  if (key === 'original' || key === 'modern') return PROFILES[key];
  throw new UnknownProfileError(name);
}

export function withQuirks(base: QuirkProfile, overrides: Partial<QuirkProfile>): QuirkProfile {
  return Object.freeze({ ...base, ...overrides });
}

// "shr,-shl,dump" -> { shrCopiesVy: true, shlCopiesVy: false, storeDumpAdvancesI: true }
export function parseQuirkOverrides(text: string): Partial<QuirkProfile> {
  const out: { -readonly [K in QuirkName]?: boolean } = {};
  for (const raw of text.split(',')) {
    const item = raw.trim();
    if (!item) continue;
    const off = item.startsWith('-');
    const name = ALIASES[(off ? item.slice(1) : item).toLowerCase()];
    if (!name) throw new UnknownProfileError(item);
    out[name] = !off;
  }
  return out;
}
