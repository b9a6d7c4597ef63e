export * from './activeJobSet.js'
export * from './tracker.js'
