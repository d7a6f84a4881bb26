#!/usr/bin/env node
import { KernelConfig } from './constants'
import { Path } from './paths/path'
import { SvgReader } from './reader/base'
import { Capper, parseCapper } from './stroke/cappers'
import { Joiner, MiterJoin, parseJoiner } from './stroke/joiners'

export type OutputFormat = 'svg' | 'ps' | 'pdf' | 'string'

export interface ProcessOptions {
  flatten?: number
  stroke?: number
  capper?: Capper
  joiner?: Joiner
  format?: OutputFormat
  config?: Partial<KernelConfig>
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

const FORMATS: OutputFormat[] = ['svg', 'ps', 'pdf', 'string']

function formatPath(p: Path, format: OutputFormat): string {
  switch (format) {
    case 'svg':
      return p.toSvg()
    case 'ps':
      return p.toPs()
    case 'pdf':
      return p.toPdf()
    case 'string':
      return p.toString()
  }
}

// Strokes and then flattens the path when asked.
export function processPath(path: Path, options: ProcessOptions = {}): string {
  let p = path
  if (options.stroke !== undefined) {
    p = p.stroke(options.stroke, options.capper ?? Capper.Butt, options.joiner ?? MiterJoin)
  }
  if (options.flatten !== undefined) {
    p = p.flatten(options.flatten)
  }
  return formatPath(p, options.format ?? 'svg')
}

// One line of path data per path of the SVG document.
export function processSvg(content: string, options: ProcessOptions = {}): string[] {
  const records = new SvgReader(options.config).readString(content)
  return records.map(({ path }) => processPath(path, options))
}

function parsePositive(flag: string, value: string | undefined): number {
  const num = value === undefined ? NaN : Number(value)
  if (!Number.isFinite(num) || num <= 0) {
    throw new UsageError(`${flag} needs a positive number, got ${value ?? 'nothing'}`)
  }
  return num
}

export function parseArgs(args: string[]): { input: string; options: ProcessOptions } {
  const options: ProcessOptions = {}
  let input: string | undefined
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '--flatten':
        options.flatten = parsePositive(arg, args[++i])
        break
      case '--stroke':
        options.stroke = parsePositive(arg, args[++i])
        break
      case '--cap': {
        const value = args[++i] ?? ''
        options.capper = parseCapper(value)
        if (options.capper === undefined) {
          throw new UsageError(`Unknown cap: ${value}`)
        }
        break
      }
      case '--join': {
        const value = args[++i] ?? ''
        options.joiner = parseJoiner(value)
        if (options.joiner === undefined) {
          throw new UsageError(`Unknown join: ${value}`)
        }
        break
      }
      case '--format': {
        const value = args[++i]
        const format = FORMATS.find((f) => f === value)
        if (format === undefined) {
          throw new UsageError(`Unknown format: ${value ?? 'nothing'}`)
        }
        options.format = format
        break
      }
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option: ${arg}`)
        } else if (input !== undefined) {
          throw new UsageError(`Unexpected argument: ${arg}`)
        }
        input = arg
    }
  }
  if (input === undefined) {
    throw new UsageError('Missing input file')
  }
  return { input, options }
}

function usage(): void {
  console.log(
    'Usage: path-kernel <input.svg> [--flatten <tol>] [--stroke <width>] [--cap butt|round|square]'
  )
  console.log('         [--join bevel|round|miter|miter-clip|arcs|arcs-clip]')
  console.log('         [--format svg|ps|pdf|string]')
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)
  if (args.length < 1) {
    usage()
    process.exit(1)
  }

  try {
    const { input, options } = parseArgs(args)
    const records = await new SvgReader(options.config).read(input)
    for (const { path } of records) {
      console.log(processPath(path, options))
    }
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message)
      usage()
    } else {
      console.error('Processing failed:', error instanceof Error ? error.message : error)
    }
    process.exit(1)
  }
}

if (require.main === module) {
  void main()
}
