/**
 * Core Layer Index
 *
 * Re-exports the stream primitives, the bridge, errors, and ports.
 */

export * from './subject.js'
export * from './bridge.js'
export * from './errors.js'

// Ports
export * from './ports/index.js'
