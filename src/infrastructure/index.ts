/**
 * Infrastructure Layer Index
 *
 * Concrete push-sources and reactive-library adapters.
 */

export * from './sources/index.js'
export * from './rxjsInterop.js'
