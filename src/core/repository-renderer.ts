/**
 * Repository Renderer
 *
 * Assembles one Go repository file from a header, imports, the Manager
 * interface and the method implementations.
 *
 * Output layout:
 *   <header>
 *
 *   import (...)
 *
 *   // <Type>Manager interface ...
 *   type <Type>Manager interface { ... }
 *
 *   // <comment>
 *   func (p *<Receiver>) <Method>(...) (...) { ... }
 */

import type { Method, Structure } from './structure-model.js'

export const DEFAULT_HEADER = `// code generated automatically
// can be edited by hand if needed

// Package repository contains the repository layer of the application.
// generate this file by running: repogen generate <path to file holding struct>
package repository`

export const DEFAULT_RECEIVER = 'PostgresRepository'

interface BuilderState {
  header: string
  imports: readonly string[]
  methods: readonly Method[]
  receiver: string
}

/**
 * Immutable file builder: every `with*` call returns a new builder
 */
export class RepositoryFileBuilder {
  private constructor(
    readonly structure: Structure,
    private readonly state: BuilderState
  ) {}

  static for(structure: Structure, receiver: string = DEFAULT_RECEIVER): RepositoryFileBuilder {
    return new RepositoryFileBuilder(structure, { header: '', imports: [], methods: [], receiver })
  }

  get header(): string {
    return this.state.header
  }

  get imports(): readonly string[] {
    return this.state.imports
  }

  get methods(): readonly Method[] {
    return this.state.methods
  }

  withHeader(header: string): RepositoryFileBuilder {
    return new RepositoryFileBuilder(this.structure, { ...this.state, header })
  }

  /** Imports are kept in insertion order and never deduplicated */
  withImport(packageName: string): RepositoryFileBuilder {
    return new RepositoryFileBuilder(this.structure, { ...this.state, imports: [...this.state.imports, packageName] })
  }

  withMethod(method: Method): RepositoryFileBuilder {
    return new RepositoryFileBuilder(this.structure, { ...this.state, methods: [...this.state.methods, method] })
  }

  render(): string {
    const { header, imports, methods, receiver } = this.state
    const { name } = this.structure
    const lines: string[] = []

    lines.push(header)
    lines.push('')

    lines.push('import (')
    for (const importName of imports) {
      lines.push(`\t"${importName}"`)
    }
    lines.push(')')
    lines.push('')

    lines.push(`// ${name}Manager interface to interact with database`)
    lines.push(`type ${name}Manager interface {`)
    for (const method of methods) {
      lines.push(`\t${method.name}(${method.iParams}) (${method.oParams})`)
    }
    lines.push('}')
    lines.push('')

    for (const method of methods) {
      lines.push(method.comment)
      lines.push(`func (p *${receiver}) ${method.name}(${method.iParams}) (${method.oParams}) {`)
      lines.push(method.body)
      lines.push('}')
      lines.push('')
    }

    return lines.join('\n') + '\n'
  }
}
