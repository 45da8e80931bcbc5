#!/usr/bin/env node
/* eslint-disable no-console */
import { isChip8Error } from '@core/cpu/errors'
import { Chip8System } from '@core/system/system'
import { readRomFile } from '@host/node/rom'
import { disasmAt, formatTraceLine } from '@utils/disasm'
import { parseArgs } from '@host/node/args'

// One line per executed instruction, state shown before execution
async function main() {
  const args = parseArgs(process.argv.slice(2))
  const rom = readRomFile(args.rom, args.start)
  const sys = new Chip8System({ profile: args.profile, seed: args.seed })
  sys.loadRom(rom, args.start)
  sys.setPc(args.start)
  for (const k of args.heldKeys) sys.keyPress(k)

  const maxInst = args.max > 0 ? args.max : args.frames * args.cyclesPerFrame
  for (let i = 0; i < maxInst; i++) {
    if (i > 0 && i % args.cyclesPerFrame === 0) sys.cycleTimers()
    const pc = sys.registers.pc
    const dis = disasmAt((addr) => sys.memory.readU16(addr), pc)
    console.log(formatTraceLine(dis, sys.registers.snapshot()))
    sys.cycle()
  }
}

main().catch((e) => {
  console.error(isChip8Error(e) ? `${e.kind}: ${e.message}` : e)
  process.exit(1)
})
