/**
 * Core Module
 *
 * Structure model, resolver, synthesizers and renderer.
 */

export * from './errors.js'
export * from './structure-model.js'
export * from './tag-parser.js'
export * from './structure-resolver.js'
export * from './statement-builder.js'
export * from './method-synthesizer.js'
export * from './repository-renderer.js'
export * from './repository-generator.js'
