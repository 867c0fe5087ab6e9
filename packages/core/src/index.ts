export { ConfigManager } from './config-manager.js';
export type { ConfigOverrides, LoadOptions } from './config-manager.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogSink } from './logger.js';
export { listPluginDirectories, loadManifest, findReadme } from './plugin-scanner.js';
export type { ListOptions } from './plugin-scanner.js';
export { renderHeader, renderPluginSection, renderDocument } from './doc-renderer.js';
export { DocGenerator, generate } from './doc-generator.js';
export type { ScanResult, GeneratorOptions } from './doc-generator.js';
