export { ConfigLoadError } from './errors.js';
export type { ConfigLoadOptions } from './loader.js';
export { loadLogConfigFromFile, loadLogConfigFromString } from './loader.js';
export type { ConfigLintResult, ConfigParseResult } from './validator.js';
export { parseLogConfig, validateLogConfig } from './validator.js';
