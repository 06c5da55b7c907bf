/**
 * Source Loader
 *
 * Resolves the CLI's source argument to the Go files it names.
 */

import { promises as fs } from 'fs'
import { join, resolve } from 'path'
import { parseSourceFile } from './parser.js'
import type { SourceFile } from './ast.js'

export interface LoadedSource {
  path: string
  text: string
}

/**
 * Load a single `.go` file, or every non-test `.go` file directly inside a
 * directory (sorted by name so that output order is stable)
 */
export async function loadSourceFiles(source: string): Promise<LoadedSource[]> {
  const absolutePath = resolve(source)
  const stat = await fs.stat(absolutePath)

  if (!stat.isDirectory()) {
    return [{ path: source, text: await fs.readFile(absolutePath, 'utf8') }]
  }

  const entries = await fs.readdir(absolutePath, { withFileTypes: true })
  const names = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.go') && !entry.name.endsWith('_test.go'))
    .map((entry) => entry.name)
    .sort()

  const loaded: LoadedSource[] = []
  for (const name of names) {
    loaded.push({
      path: join(source, name),
      text: await fs.readFile(join(absolutePath, name), 'utf8'),
    })
  }
  return loaded
}

export async function loadAndParse(source: string): Promise<SourceFile[]> {
  const loaded = await loadSourceFiles(source)
  return loaded.map(({ path, text }) => parseSourceFile(text, path))
}
