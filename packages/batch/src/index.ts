export * from './types.js'
export * from './shape.js'
export * from './jobSpec.js'
export * from './batchService.js'
export * from './submitter.js'
export * from './in_memory_batch_service.js'
