export * from './gcp_cfg.js'
export * from './sweep_cfg.js'
