export * from './types.js'
export * from './defaults.js'
export * from './builder.js'
