/**
 * repogen
 *
 * Generate Go CRUD repositories from tagged struct declarations
 */

export * from './core/index.js'

// Go source front end
export { GoParser, parseSourceFile } from './source/parser.js'
export { loadSourceFiles, loadAndParse, type LoadedSource } from './source/loader.js'
export { scan, type Token, type TokenKind } from './source/scanner.js'
export { unquote } from './source/literals.js'
export type * from './source/ast.js'
export { formatTypeExpr } from './source/ast.js'

export { resolveConfig, GeneratorConfigSchema, type GeneratorConfig, type GenerateOptions } from './config.js'
