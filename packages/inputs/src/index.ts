export * from './materializer.js'
