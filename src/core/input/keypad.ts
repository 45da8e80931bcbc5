import { InvalidKeyError } from '@core/cpu/errors';

export const NUM_KEYS = 16;

// Hex keypad 0..F. Level-triggered: a key stays down until explicitly released.
export class Keypad {
  private readonly pressed: boolean[] = new Array<boolean>(NUM_KEYS).fill(false);

  private static check(key: number): number {
    if (!Number.isInteger(key) || key < 0 || key >= NUM_KEYS) throw new InvalidKeyError(key);
    return key;
  }

  press(key: number) { this.pressed[Keypad.check(key)] = true; }
  release(key: number) { this.pressed[Keypad.check(key)] = false; }
  isPressed(key: number): boolean { return this.pressed[Keypad.check(key)]; }

  // Lowest-indexed key currently down, or null
  firstPressed(): number | null {
    const idx = this.pressed.indexOf(true);
    return idx >= 0 ? idx : null;
  }

  releaseAll() { this.pressed.fill(false); }

  snapshot(): boolean[] { return this.pressed.slice(); }
}
