/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { loadProgramFile } from '@core/loader/program'
import { runProgram } from '@core/harness/headless'
import { formatFault } from '@core/cpu/diagnostics'
import { LoadError } from '@core/cpu/errors'
import { encodeMemoryPng } from '@utils/memory_png'
import { getEnv, getEnvFlag, getEnvInt } from '@utils/env'

export interface CliOptions {
  program: string | null
  trace: boolean
  maxSteps: number
  dumpPng: string | null
}

export interface CliIO {
  out: (line: string) => void
  err: (line: string) => void
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
}

export const EXIT_OK = 0
export const EXIT_FAULT = 1
export const EXIT_LOAD = 2
export const EXIT_TIMEOUT = 3

// Flags override the VM_* environment variables
export function parseArgs(argv: string[]): CliOptions {
  let program: string | null = null
  let trace = getEnvFlag('VM_TRACE')
  let maxSteps = getEnvInt('VM_MAX_STEPS', 0)
  let dumpPng = getEnv('VM_DUMP_PNG')
  for (const a of argv) {
    if (a === '--trace') trace = true
    else if (a.startsWith('--max-steps=')) {
      const n = parseInt(a.slice(12), 10)
      if (!Number.isFinite(n) || n < 0) throw new LoadError(`invalid --max-steps value: ${a.slice(12)}`)
      maxSteps = n
    }
    else if (a.startsWith('--dump-png=')) dumpPng = a.slice(11)
    else if (a.startsWith('--')) throw new LoadError(`unknown option: ${a}`)
    else if (program === null) program = a
    else throw new LoadError(`unexpected argument: ${a}`)
  }
  return { program, trace, maxSteps, dumpPng }
}

export function runCli(argv: string[], io: CliIO = defaultIO): number {
  let opts: CliOptions
  let program: Uint8Array
  try {
    opts = parseArgs(argv)
    if (opts.program === null) {
      io.err('[vm] No program given')
      program = new Uint8Array(0)
    } else {
      program = loadProgramFile(opts.program)
      io.err(`[load] ${program.length} bytes from ${path.basename(opts.program)}`)
    }
  } catch (e) {
    if (e instanceof LoadError) {
      io.err(`[load] ${e.message}`)
      return EXIT_LOAD
    }
    throw e
  }

  const res = runProgram(program, {
    maxSteps: opts.maxSteps,
    output: io.out,
    trace: opts.trace ? io.err : undefined,
  })

  if (opts.dumpPng) {
    fs.mkdirSync(path.dirname(path.resolve(opts.dumpPng)), { recursive: true })
    fs.writeFileSync(opts.dumpPng, encodeMemoryPng(res.memory))
    io.err(`[vm] memory image written to ${opts.dumpPng}`)
  }

  switch (res.reason) {
    case 'halt':
      io.err(`[vm] halted after ${res.steps} steps`)
      return EXIT_OK
    case 'timeout':
      io.err(`[vm] step limit ${opts.maxSteps} reached`)
      return EXIT_TIMEOUT
    case 'fail':
      io.err(res.fault ? formatFault(res.fault) : `[vm] ${res.message ?? 'fault'}`)
      return EXIT_FAULT
  }
}
