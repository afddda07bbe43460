export { createLogger } from './logger.js';
export type { AppConfig } from './config/config.js';
export { loadConfig, loadAnalyzerFile, DEFAULT_CONFIG_PATH } from './config/config.js';
