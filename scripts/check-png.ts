/* eslint-disable no-console */
import fs from 'node:fs'
import { PNG } from 'pngjs'

function usage(): never {
  console.error('Usage: tsx scripts/check-png.ts <path> [--scale=N]')
  process.exit(2)
}

const pathArg = process.argv[2]
if (!pathArg) usage()
if (!fs.existsSync(pathArg)) {
  console.error(`File not found: ${pathArg}`)
  process.exit(2)
}
const scaleArg = process.argv.find((a) => a.startsWith('--scale='))
const scale = scaleArg ? parseInt(scaleArg.slice(8), 10) : 8

// Counts lit display pixels in a dump written by run-rom (sampling one pixel per scaled cell)
fs.createReadStream(pathArg)
  .pipe(new PNG())
  .on('parsed', function parsed(this: PNG) {
    const { width: W, height: H, data } = this
    const w = Math.floor(W / scale), h = Math.floor(H / scale)
    let lit = 0
    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        const o = ((y * scale) * W + x * scale) << 2
        if (data[o] > 127 || data[o + 1] > 127 || data[o + 2] > 127) lit++
      }
    }
    const total = w * h
    const pct = total > 0 ? (100 * lit / total) : 0
    const ok = lit > 0
    console.log(JSON.stringify({ path: pathArg, width: w, height: h, lit, lit_pct: +pct.toFixed(2), ok }))
    process.exit(ok ? 0 : 1)
  })
  .on('error', (e: Error) => { console.error(e); process.exit(1) })
