export { loadConfig, parseServiceNames, type Environment, type LoadConfigOptions } from './loadConfig.js';
export { DEFAULT_CATALOG_URL } from './schema.js';
