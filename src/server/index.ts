/**
 * Node-side helpers around the reaction engine: configuration, logging,
 * catalog loading from disk, and reaction tracing.
 */

export { config, createConfig, parseEnv, DEFAULT_ELEMENT_CATALOG_PATH } from './config';
export type { AppConfig } from './config';
export { logger, createLogger } from './utils/logger';
export { loadElementCatalog, getDefaultCatalog } from './catalog/loadElementCatalog';
export { createReactionTraceListener, attachReactionTracing } from './reactions/reactionTracing';
export type { DetachReactionTracing } from './reactions/reactionTracing';
