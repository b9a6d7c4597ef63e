export * from './collector.js'
