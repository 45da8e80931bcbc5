// CRC32 (IEEE) used to fingerprint framebuffers in tests and the headless runner
const table = new Uint32Array(256).map((_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) c = (c & 1) ? 0xEDB88320 ^ (c >>> 1) : (c >>> 1);
  return c >>> 0;
});

export function crc32(bytes: Uint8Array): number {
  let crc = ~0 >>> 0;
  for (let i = 0; i < bytes.length; i++) {
    crc = (crc >>> 8) ^ table[(crc ^ bytes[i]) & 0xFF];
  }
  return (~crc) >>> 0;
}

export const crcHex = (v: number): string => v.toString(16).toUpperCase().padStart(8, '0');
