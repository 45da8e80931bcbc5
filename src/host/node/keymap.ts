// Conventional layout of the hex keypad on a QWERTY keyboard:
//   1 2 3 4      1 2 3 C
//   Q W E R  ->  4 5 6 D
//   A S D F      7 8 9 E
//   Z X C V      A 0 B F
const LAYOUT: Record<string, number> = {
  '1': 0x1, '2': 0x2, '3': 0x3, '4': 0xC,
  q: 0x4, w: 0x5, e: 0x6, r: 0xD,
  a: 0x7, s: 0x8, d: 0x9, f: 0xE,
  z: 0xA, x: 0x0, c: 0xB, v: 0xF,
};

export function keyForChar(ch: string): number | null {
  const k = LAYOUT[ch.toLowerCase()];
  return k === undefined ? null : k;
}

// "qw" -> [0x4, 0x5]; unmapped characters are ignored
export function parseHeldKeys(text: string): number[] {
  const keys: number[] = [];
  for (const ch of text) {
    const k = keyForChar(ch);
    if (k !== null && !keys.includes(k)) keys.push(k);
  }
  return keys;
}
