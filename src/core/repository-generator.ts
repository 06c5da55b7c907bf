/**
 * Repository Generator
 *
 * Drives the pipeline for parsed source files: resolve structures, synthesize
 * the four methods, render one file per structure.
 */

import { promises as fs } from 'fs'
import { join } from 'path'
import type { SourceFile } from '../source/ast.js'
import { OutputWriteError } from './errors.js'
import { SYNTHESIZERS } from './method-synthesizer.js'
import { DEFAULT_HEADER, DEFAULT_RECEIVER, RepositoryFileBuilder } from './repository-renderer.js'
import { StructureResolver } from './structure-resolver.js'
import type { Structure } from './structure-model.js'

export interface RepositoryFile {
  /** Destination, `<outputDir>/<Type>_repository.go` */
  path: string
  structure: Structure
  content: string
}

export interface RepositoryGeneratorOptions {
  /** Directory generated files go to (default: "repository") */
  outputDir?: string
  /** Table every statement targets (default: "testTable") */
  tableName?: string
  /** Receiver type the methods are bound to (default: "PostgresRepository") */
  receiver?: string
  header?: string
}

const DEFAULT_OPTIONS: Required<RepositoryGeneratorOptions> = {
  outputDir: 'repository',
  tableName: 'testTable',
  receiver: DEFAULT_RECEIVER,
  header: DEFAULT_HEADER,
}

const IMPORTS = ['context', 'fmt']

export class RepositoryGenerator {
  private options: Required<RepositoryGeneratorOptions>
  private resolver: StructureResolver

  constructor(options: RepositoryGeneratorOptions = {}) {
    this.options = {
      outputDir: options.outputDir ?? DEFAULT_OPTIONS.outputDir,
      tableName: options.tableName ?? DEFAULT_OPTIONS.tableName,
      receiver: options.receiver ?? DEFAULT_OPTIONS.receiver,
      header: options.header ?? DEFAULT_OPTIONS.header,
    }
    this.resolver = new StructureResolver({ tableName: this.options.tableName })
  }

  /**
   * Generate files for every structure in every source file, in order.
   * The first error aborts the whole run.
   */
  generate(files: readonly SourceFile[]): RepositoryFile[] {
    const output: RepositoryFile[] = []
    for (const file of files) {
      for (const structure of this.resolver.resolve(file)) {
        output.push(this.generateFile(structure))
      }
    }
    return output
  }

  generateFile(structure: Structure): RepositoryFile {
    let builder = RepositoryFileBuilder.for(structure, this.options.receiver).withHeader(this.options.header)

    for (const importName of IMPORTS) {
      builder = builder.withImport(importName)
    }
    for (const synthesize of SYNTHESIZERS) {
      builder = builder.withMethod(synthesize(structure))
    }

    return {
      path: join(this.options.outputDir, `${structure.name}_repository.go`),
      structure,
      content: builder.render(),
    }
  }
}

/**
 * Write (or overwrite) a generated file. The destination directory must
 * already exist.
 */
export async function writeRepositoryFile(file: RepositoryFile): Promise<void> {
  try {
    await fs.writeFile(file.path, file.content, 'utf8')
  } catch (error) {
    throw new OutputWriteError(file.path, error)
  }
}

// Factory function for easy usage
export function generateRepositoryFile(structure: Structure, options: RepositoryGeneratorOptions = {}): RepositoryFile {
  return new RepositoryGenerator(options).generateFile(structure)
}
