export * from './gcp_batch_service.js'
export * from './gcs_object_store.js'
export * as config from './config/index.js'
