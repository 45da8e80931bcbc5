#!/usr/bin/env node
/* eslint-disable no-console */
import { setTimeout as sleep } from 'node:timers/promises'
import { isChip8Error } from '@core/cpu/errors'
import { runFrames } from '@core/harness/headless'
import { Chip8System } from '@core/system/system'
import { FrameClock } from '@host/node/clock'
import { writeFramePng } from '@host/node/png'
import { readRomFile } from '@host/node/rom'
import { crcHex } from '@utils/crc32'
import { frameCrc32, frameToAscii } from '@utils/frame'
import { parseArgs } from '@host/node/args'

// Realtime mode: one instruction per millisecond, timers on the 17/17/16 ms frame cadence
async function runRealtime(sys: Chip8System, frames: number): Promise<{ idle: number, sound: number }> {
  const clock = new FrameClock(performance.now())
  let idle = 0
  let sound = 0
  while (clock.frames < frames) {
    if (clock.poll(performance.now())) {
      sys.cycleTimers()
      if (sys.isSoundOn()) sound++
    } else {
      idle++
    }
    sys.cycle()
    await sleep(1)
  }
  return { idle, sound }
}

async function main() {
  const args = parseArgs(process.argv.slice(2))
  const rom = readRomFile(args.rom, args.start)
  const sys = new Chip8System({ profile: args.profile, seed: args.seed })
  sys.loadRom(rom, args.start)
  sys.setPc(args.start)
  for (const k of args.heldKeys) sys.keyPress(k)

  const t0 = performance.now()
  let idle = 0
  let sound = 0
  if (args.realtime) {
    ;({ idle, sound } = await runRealtime(sys, args.frames))
  } else {
    const stats = runFrames(sys, args.frames, args.cyclesPerFrame)
    idle = stats.idleCycles
    sound = stats.soundFrames
  }
  const ms = Math.max(1, performance.now() - t0)

  const frame = sys.getFrame()
  if (args.ascii) for (const line of frameToAscii(frame)) console.log(line)
  if (args.png) {
    await writeFramePng(args.png, frame, args.scale)
    console.log(`[snapshot] wrote ${args.png}`)
  }
  console.log('Stats.')
  console.log(`Seed: ${sys.seed}`)
  console.log(`Execution time: ${ms.toFixed(0)} ms`)
  console.log(`Cycles: ${sys.cycles}`)
  console.log(`Cycles per second: ${(1000 * sys.cycles / ms).toFixed(1)}`)
  console.log(`No frame cycles: ${idle}`)
  console.log(`Sound frames: ${sound}`)
  console.log(`Frame CRC: ${crcHex(frameCrc32(frame))}`)
}

main().catch((e) => {
  console.error(isChip8Error(e) ? `${e.kind}: ${e.message}` : e)
  process.exit(1)
})
