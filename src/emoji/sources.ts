// Source image handles and directory scanning

import { readdir, readFile } from 'node:fs/promises'
import { basename, extname, join } from 'node:path'
import { EmptyInputError } from '../errors'

export interface SourceImage {
  /** File name, used for legacy codepoints and diagnostics */
  readonly name: string
  /** Reads the encoded image; nothing is held open between calls */
  load(): Promise<Uint8Array>
}

export function fileSource(path: string): SourceImage {
  return {
    name: basename(path),
    load: () => readFile(path),
  }
}

export function memorySource(name: string, data: Uint8Array): SourceImage {
  return {
    name,
    load: async () => data,
  }
}

const collator = new Intl.Collator('en', { numeric: true, sensitivity: 'base' })

// Numeric-aware name order: 2.png before 10.png
export function compareImageNames(a: string, b: string): number {
  return collator.compare(a, b) || (a < b ? -1 : a > b ? 1 : 0)
}

/**
 * List `*.png` files of a directory (not recursive) in name order.
 * Throws EmptyInputError when there are none.
 */
export async function scanDirectory(dir: string): Promise<SourceImage[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  const names = entries
    .filter(entry => entry.isFile() && extname(entry.name).toLowerCase() === '.png')
    .map(entry => entry.name)
    .sort(compareImageNames)

  if (names.length === 0) throw new EmptyInputError(dir)

  return names.map(name => fileSource(join(dir, name)))
}
