import fs from 'node:fs';
import { PROGRAM_START, RAM_SIZE } from '@core/bus/memory';
import { InvalidRomError } from '@core/cpu/errors';

// Reads a raw ROM image and checks that it fits between `start` and the end of memory
export function readRomFile(romPath: string, start = PROGRAM_START, memorySize = RAM_SIZE): Uint8Array {
  if (!fs.existsSync(romPath)) throw new InvalidRomError(`ROM not found: ${romPath}`);
  const buf = new Uint8Array(fs.readFileSync(romPath));
  if (buf.length === 0) throw new InvalidRomError(`ROM is empty: ${romPath}`);
  const room = memorySize - start;
  if (buf.length > room) throw new InvalidRomError(`ROM too large: ${buf.length} bytes, ${room} available from 0x${start.toString(16)}`);
  return buf;
}
