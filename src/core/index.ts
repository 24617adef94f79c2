// Core module exports for forcegen

// Force Matrix
export * from './force-matrix';

// Config
export { ConfigManager, getConfigManager, isConfigKey } from './config';
export type { Config } from './config';
