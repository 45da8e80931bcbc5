export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;

export type Pixel = 0 | 1;
export type Frame = ReadonlyArray<ReadonlyArray<Pixel>>;

const SPRITE_WIDTH = 8;

export class Framebuffer {
  private readonly cells: Uint8Array;

  constructor(public readonly width = DISPLAY_WIDTH, public readonly height = DISPLAY_HEIGHT) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Invalid display size ${width}x${height}`);
    }
    this.cells = new Uint8Array(width * height);
  }

  clear(): void {
    this.cells.fill(0);
  }

  fill(pixel: Pixel): void {
    this.cells.fill(pixel);
  }

  getPixel(x: number, y: number): Pixel {
    return this.cells[y * this.width + x] ? 1 : 0;
  }

  // XOR-draw an 8-pixel-wide sprite, one byte per row, MSB leftmost.
  // The start position wraps; pixels past the right or bottom edge are clipped.
  // Returns true if any set pixel was erased.
  drawSprite(sprite: ArrayLike<number>, x: number, y: number): boolean {
    const startX = x % this.width;
    const startY = y % this.height;
    let collision = false;
    for (let n = 0; n < sprite.length; n++) {
      const row = startY + n;
      if (row >= this.height) break;
      const bits = sprite[n] & 0xff;
      for (let b = 0; b < SPRITE_WIDTH; b++) {
        const col = startX + b;
        if (col >= this.width) break;
        if ((bits & (0x80 >>> b)) === 0) continue;
        const idx = row * this.width + col;
        if (this.cells[idx] === 1) collision = true;
        this.cells[idx] ^= 1;
      }
    }
    return collision;
  }

  getFrame(): Frame {
    const rows: Pixel[][] = [];
    for (let y = 0; y < this.height; y++) {
      const row: Pixel[] = [];
      for (let x = 0; x < this.width; x++) row.push(this.getPixel(x, y));
      rows.push(row);
    }
    return rows;
  }

  // Row-major copy, one byte per pixel
  getFrameBuffer(): Uint8Array {
    return this.cells.slice();
  }

  litCount(): number {
    let count = 0;
    for (let k = 0; k < this.cells.length; k++) count += this.cells[k];
    return count;
  }
}
