import fs from 'node:fs';
import path from 'node:path';
import { PNG } from 'pngjs';
import type { Frame } from '@core/display/framebuffer';

export interface PngColors {
  on: [number, number, number];
  off: [number, number, number];
}

const DEFAULT_COLORS: PngColors = { on: [255, 255, 255], off: [0, 0, 0] };

export function frameToPng(frame: Frame, scale = 8, colors: PngColors = DEFAULT_COLORS): PNG {
  const h = frame.length;
  const w = h > 0 ? frame[0].length : 0;
  const W = w * scale, H = h * scale;
  const png = new PNG({ width: W, height: H });
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const [r, g, b] = frame[y][x] ? colors.on : colors.off;
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W;
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + (x * scale + dx)) << 2;
          png.data[o + 0] = r;
          png.data[o + 1] = g;
          png.data[o + 2] = b;
          png.data[o + 3] = 255;
        }
      }
    }
  }
  return png;
}

export async function writeFramePng(outPath: string, frame: Frame, scale = 8): Promise<void> {
  const png = frameToPng(frame, scale);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  const stream = fs.createWriteStream(outPath);
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve());
    stream.on('error', (e) => reject(e));
    png.pack().pipe(stream);
  });
}
