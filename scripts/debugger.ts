#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import readline from 'node:readline'
import { MicroCPU } from '@core/cpu/cpu'
import { demoProgram } from '@core/program/demo'
import { Debugger, DEFAULT_WATCHDOG, RESET_VECTOR } from '@host/cli/debugger'
import { formatRegisters } from '@utils/format'
import { getEnvInt } from '@utils/env'

async function main() {
  const cpu = new MicroCPU()
  cpu.write16(RESET_VECTOR, 0x0000)
  cpu.loadProgram(demoProgram(), 0x0000)
  cpu.reset(0x0000)

  const dbg = new Debugger({
    cpu,
    readFile: (p) => new Uint8Array(fs.readFileSync(p)),
    watchdog: getEnvInt('MICROTRACE_WATCHDOG') ?? DEFAULT_WATCHDOG,
  })

  console.log('Micro-step CPU debugger')
  console.log("Type 'help' for commands.\n")
  console.log(formatRegisters(cpu))

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '\n> ' })
  const closed = new Promise<void>((resolve) => rl.on('close', () => resolve()))
  rl.on('line', (line) => {
    const res = dbg.execute(line)
    for (const l of res.lines) console.log(l)
    if (res.quit) rl.close()
    else rl.prompt()
  })
  rl.prompt()
  await closed
}

main().catch((e) => { console.error(e); process.exit(1) })
