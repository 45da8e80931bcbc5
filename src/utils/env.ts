// Empty variables read as unset
export function getEnv(name: string): string | null {
  const v = process.env[name];
  return v && v.length > 0 ? v : null;
}

export function envFlag(name: string): boolean {
  return getEnv(name) === '1';
}

// Accepts decimal or 0x-prefixed hex
export function parseNum(text: string | null | undefined): number | null {
  if (text === null || text === undefined) return null;
  const s = text.trim();
  if (!s) return null;
  const n = /^0x/i.test(s) ? parseInt(s.slice(2), 16) : Number(s);
  return Number.isFinite(n) ? n : null;
}
