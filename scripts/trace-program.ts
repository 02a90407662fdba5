#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import { MicroCPU } from '@core/cpu/cpu'
import { demoProgram } from '@core/program/demo'
import { loadImage, loadHexText, type LoadResult } from '@core/loader/program'
import { disasmAt, formatDisasmLine } from '@utils/disasm'
import { formatTrace, formatRegisters } from '@utils/format'
import { getEnv } from '@utils/env'

function parseArgs() {
  const argv = process.argv.slice(2)
  let file = getEnv('PROGRAM')
  let origin = parseInt(getEnv('ORIGIN') || '0', 16)
  let max = parseInt(getEnv('TRACE_MAX') || '64', 10)
  let mode: 'cycles' | 'instructions' = 'instructions'
  for (const a of argv) {
    if (a.startsWith('--file=')) file = a.slice(7)
    else if (a.startsWith('--origin=')) origin = parseInt(a.slice(9), 16)
    else if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a === '--cycles') mode = 'cycles'
  }
  if (!Number.isFinite(max) || max <= 0) max = 64
  return { file, origin, max, mode }
}

function load(cpu: MicroCPU, file: string | null, origin: number): LoadResult {
  if (!file) return loadImage(cpu, demoProgram(), origin)
  const data = new Uint8Array(fs.readFileSync(file))
  return /\.(hex|txt)$/i.test(file) ? loadHexText(cpu, new TextDecoder().decode(data), origin) : loadImage(cpu, data, origin)
}

async function main() {
  const args = parseArgs()
  if (args.file && !fs.existsSync(args.file)) { console.error(`Program not found: ${args.file}`); process.exit(2) }
  const cpu = new MicroCPU()
  const res = load(cpu, args.file, args.origin)
  if (!res.ok) { console.error(`[load] ${res.error}`); process.exit(2) }
  cpu.reset(res.origin)

  for (let i = 0; i < args.max && !cpu.halted; i++) {
    if (args.mode === 'cycles') {
      cpu.stepCycle()
      for (const l of formatTrace(cpu.timeline.last(1))) console.log(l)
    } else {
      console.log(formatDisasmLine(disasmAt((a) => cpu.memory.read(a), cpu.state.pc)))
      cpu.stepInstruction()
    }
  }
  console.log(formatRegisters(cpu))
  if (cpu.halted) console.log(`halted: ${cpu.haltReason}`)
}

main().catch((e) => { console.error(e); process.exit(1) })
