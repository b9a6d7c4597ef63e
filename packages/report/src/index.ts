export * from './series.js'
export * from './charts.js'
export * from './renderer.js'
