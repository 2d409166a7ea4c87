/**
 * Package entry point for library consumers.
 */

export * from './core/index.js'
export * from './infrastructure/index.js'
export { loadAppConfig, type AppConfig } from './config/appConfig.js'
