// Command line entry: sbix-builder <input-dir> [options]

import { parseArgs } from 'node:util'
import { basename } from 'node:path'
import { formatFromPath, isOutputFormat, parseStrikeList, type BuildOptions, type OutputFormat } from './config'
import { buildFontFile } from './emoji/assemble'
import { consoleObserver, type Clock } from './progress'

export interface CliIO {
  log(line: string): void
  error(line: string): void
}

const USAGE = `
sbix-builder: build a bitmap emoji font from a directory of PNG images

Usage:
  sbix-builder <input-dir> [options]

Options:
  -o, --output <file>     Output font (default: <input-dir-name>.ttf)
      --legacy            Take codepoints from U+<HEX>.png file names
      --base <hex>        First codepoint in standard mode (default: 1F600)
      --strikes <list>    Strike sizes in ppem (default: 32,64,128,256)
      --family <name>     Font family name (default: Custom Emoji)
      --format <fmt>      ttf, woff or woff2 (default: from the output extension)
      --timestamp <when>  Creation time as an ISO date or epoch seconds
                          (default: now); fixes the output bytes
  -q, --quiet             Only report errors
  -h, --help              Show this help
`

function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err)
  const cause = err.cause instanceof Error && !err.message.includes(err.cause.message)
    ? ` (${err.cause.message})`
    : ''
  return `${err.message}${cause}`
}

function parseCodepoint(text: string): number {
  const hex = text.replace(/^(U\+|0x)/i, '')
  return /^[0-9a-f]+$/i.test(hex) ? parseInt(hex, 16) : NaN
}

// "2024-01-01T00:00:00Z" or "1704067200"
function parseTimestamp(text: string): Date | undefined {
  const date = /^\d+$/.test(text) ? new Date(Number(text) * 1000) : new Date(text)
  return Number.isNaN(date.getTime()) ? undefined : date
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
      legacy: { type: 'boolean' },
      base: { type: 'string' },
      strikes: { type: 'string' },
      family: { type: 'string' },
      format: { type: 'string' },
      timestamp: { type: 'string' },
      quiet: { type: 'boolean', short: 'q' },
      help: { type: 'boolean', short: 'h' },
    },
  })
}

/**
 * Run the CLI and resolve to the process exit code. Failures are reported on
 * `io.error` and never leave an output file behind.
 */
export async function runCli(argv: readonly string[], io: CliIO = console): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>
  try {
    parsed = parseCliArgs(argv)
  } catch (err) {
    io.error(`error: ${describeError(err)}`)
    io.log(USAGE)
    return 2
  }

  const { values, positionals } = parsed
  if (values.help) {
    io.log(USAGE)
    return 0
  }
  if (positionals.length !== 1) {
    io.error('error: expected exactly one input directory')
    io.log(USAGE)
    return 2
  }

  const input = positionals[0]
  const output = values.output ?? `${basename(input) || 'font'}.ttf`

  let format: OutputFormat | undefined = formatFromPath(output)
  if (values.format !== undefined) {
    if (!isOutputFormat(values.format)) {
      io.error(`error: unknown format "${values.format}"`)
      return 2
    }
    format = values.format
  }

  const options: BuildOptions = {
    mode: values.legacy ? 'legacy' : 'standard',
    format,
  }
  if (values.base !== undefined) {
    const base = parseCodepoint(values.base)
    if (Number.isNaN(base)) {
      io.error(`error: invalid base codepoint "${values.base}"`)
      return 2
    }
    options.baseCodepoint = base
  }
  let clock: Clock | undefined
  if (values.timestamp !== undefined) {
    const timestamp = parseTimestamp(values.timestamp)
    if (!timestamp) {
      io.error(`error: invalid timestamp "${values.timestamp}"`)
      return 2
    }
    clock = () => timestamp
  }
  if (values.strikes !== undefined) options.strikes = parseStrikeList(values.strikes)
  if (values.family !== undefined) options.names = { familyName: values.family }

  const observer = values.quiet ? undefined : consoleObserver(line => io.log(line))

  try {
    const result = await buildFontFile({ ...options, input, output, observer, clock })
    if (!values.quiet) {
      io.log(`Font created: ${result.output} (${result.glyphCount} glyphs, strikes ${result.strikeSizes.join('/')} ppem)`)
    }
    return 0
  } catch (err) {
    io.error(`error: ${describeError(err)}`)
    return 1
  }
}
