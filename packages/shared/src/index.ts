// Types
export type { PluginManifest, PluginDirectory, PluginEntry, GenerateResult } from './types/plugin.js';
export type { LogLevel, LoggingConfig, DocsConfig, RenderOptions } from './types/config.js';

// Schemas
export { pluginManifestSchema, cargoManifestSchema } from './schemas/manifest.schema.js';
export { logLevelSchema, loggingConfigSchema, docsConfigSchema } from './schemas/config.schema.js';

// Constants
export { MANIFEST_FILE, README_FILE, NO_DESCRIPTION, CONFIG_FILE_NAMES, DEFAULT_CONFIG } from './constants.js';

// Utils
export * from './utils/index.js';
