/**
 * Core Layer - Ports Index
 */

export * from './subscribable.js'
export * from './pushSource.js'
