export * from './backend/index.js';
export * from './types/errors.js';
export type { ServerDescriptor, ServerEntry, ServersConfig } from './types/config.js';
export { ServersConfigSchema } from './types/config.js';
export { dynamicLogger as logger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
