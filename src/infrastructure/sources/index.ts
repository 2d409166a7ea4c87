export * from './manualSource.js'
export * from './emitterSource.js'
export * from './intervalSource.js'
export * from './fileWatchSource.js'
