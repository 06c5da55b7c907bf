/**
 * Generate Command
 *
 * Main entry point for repository generation from Go source
 */

import { loadAndParse } from '../../source/loader.js'
import { formatTypeExpr, type Decl, type SourceFile } from '../../source/ast.js'
import { RepositoryGenerator, writeRepositoryFile, type RepositoryFile } from '../../core/repository-generator.js'
import { resolveConfig, type GenerateOptions, type GeneratorConfig } from '../../config.js'
import { createLogger, type Logger } from '../utils/logger.js'

function describeDecl(decl: Decl): string[] {
  if (decl.kind === 'func') {
    return [`  func ${decl.receiver ? `(${decl.receiver}) ` : ''}${decl.name}`]
  }

  const lines = [`  ${decl.tok}${decl.grouped ? ' (group)' : ''} at line ${decl.pos.line}`]
  for (const spec of decl.specs) {
    switch (spec.kind) {
      case 'import':
        lines.push(`    "${spec.path}"`)
        break
      case 'value':
        lines.push(`    ${spec.names.join(', ')}`)
        break
      case 'type':
        lines.push(`    ${spec.name} ${formatTypeExpr(spec.type)}`)
        if (spec.type.kind === 'struct') {
          for (const field of spec.type.fields) {
            const names = field.names.length > 0 ? field.names.join(', ') : '(embedded)'
            lines.push(`      ${names} ${formatTypeExpr(field.type)}${field.tag ? ` ${field.tag}` : ''}`)
          }
        }
        break
    }
  }
  return lines
}

function logDeclarations(file: SourceFile, logger: Logger): void {
  logger.debug(`${file.path}: package ${file.packageName}`)
  for (const decl of file.decls) {
    for (const line of describeDecl(decl)) logger.debug(line)
  }
}

/**
 * Run the pipeline for a resolved configuration and return what was
 * generated. Nothing is written in dry-run mode.
 */
export async function runGenerate(config: GeneratorConfig, logger: Logger): Promise<RepositoryFile[]> {
  logger.info(`Loading Go source from: ${config.source}`)
  const files = await loadAndParse(config.source)
  logger.info(`Parsed ${files.length} file(s)`)

  for (const file of files) logDeclarations(file, logger)

  const generator = new RepositoryGenerator({
    outputDir: config.output,
    tableName: config.table,
    receiver: config.receiver,
  })
  const generated = generator.generate(files)

  if (generated.length === 0) {
    logger.warn('No struct type declarations found')
    return generated
  }

  for (const file of generated) {
    if (config.dryRun) {
      logger.info(`\n[DRY RUN] ${file.path}`)
      logger.info(file.content)
      continue
    }
    await writeRepositoryFile(file)
    logger.info(`  Written: ${file.path}`)
  }

  return generated
}

export async function generateCommand(source: string | undefined, options: GenerateOptions): Promise<void> {
  const logger = createLogger({ verbose: options.verbose })

  try {
    logger.info('repogen generate')
    logger.info('================')
    logger.info('')

    const config = resolveConfig(source, options)
    const generated = await runGenerate(config, logger)

    if (!config.dryRun && generated.length > 0) {
      logger.success(`\n✅ Generated ${generated.length} repository file(s) in: ${config.output}`)
    }
  } catch (error) {
    logger.error('❌ Generation failed:')
    logger.error(error instanceof Error ? error.message : String(error))
    process.exit(1)
  }
}
