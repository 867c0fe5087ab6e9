export {
  DocsError,
  ManifestParseError,
  PluginsRootError,
  ConfigError,
} from './errors.js';
