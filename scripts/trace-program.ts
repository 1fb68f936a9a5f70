#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import { loadProgramFile } from '@core/loader/program'
import { runProgram } from '@core/harness/headless'
import { formatFault } from '@core/cpu/diagnostics'
import { disassemble } from '@utils/disasm'
import { getEnv, getEnvInt } from '@utils/env'

// Usage: tsx scripts/trace-program.ts --program=programs/call.ls8 [--max=1000] [--list]
function parseArgs() {
  const argv = process.argv.slice(2)
  let program = getEnv('PROGRAM') || 'programs/print8.ls8'
  let max = getEnvInt('TRACE_MAX', 10000)
  let list = false
  for (const a of argv) {
    if (a.startsWith('--program=')) program = a.slice(10)
    else if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a === '--list') list = true
  }
  return { program, max, list }
}

function main() {
  const args = parseArgs()
  if (!fs.existsSync(args.program)) { console.error(`Program not found: ${args.program}`); process.exit(2) }
  const bytes = loadProgramFile(args.program)
  if (args.list) {
    for (const line of disassemble(bytes)) console.log(line)
    return
  }
  const res = runProgram(bytes, {
    maxSteps: args.max,
    trace: (line) => console.log(line),
    output: (line) => console.log(`[out] ${line}`),
  })
  console.log(`[vm] ${res.reason} after ${res.steps} steps, memory crc=${res.memoryCrc.toString(16).padStart(8, '0')}`)
  if (res.fault) console.log(formatFault(res.fault))
}

main()
