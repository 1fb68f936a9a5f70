#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { loadProgramFile } from '@core/loader/program'
import { runProgram } from '@core/harness/headless'
import { encodeMemoryPng } from '@utils/memory_png'

// Runs a program and writes the final memory as a 16x16 grayscale grid
function usage(): never {
  console.error('Usage: tsx scripts/dump-memory-png.ts <program.ls8> [out.png] [--scale=N]')
  process.exit(2)
}

const args = process.argv.slice(2)
const positional = args.filter((a) => !a.startsWith('--'))
const scaleArg = args.find((a) => a.startsWith('--scale='))
const programPath = positional[0]
if (!programPath) usage()
const outPath = positional[1] || path.join('screenshots', `${path.basename(programPath, '.ls8')}-memory.png`)
const scale = scaleArg ? parseInt(scaleArg.slice(8), 10) : 8

const res = runProgram(loadProgramFile(programPath), { maxSteps: 100000 })
fs.mkdirSync(path.dirname(outPath), { recursive: true })
fs.writeFileSync(outPath, encodeMemoryPng(res.memory, { scale }))
console.log(JSON.stringify({ program: programPath, out: outPath, reason: res.reason, steps: res.steps }))
