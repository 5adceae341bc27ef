/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, loadConfig, ConfigSystemImpl, deepMerge } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  ConveyorConfigSchema,
  PartialConveyorConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  ConveyorConfig,
  PartialConveyorConfig,
  QueueConfig,
  WorkersConfig,
  ProbeConfig,
  OrchestratorConfig,
  RetentionConfig,
  LlmConfig,
  CrawlerConfig,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
