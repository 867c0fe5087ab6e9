import type { DocsConfig } from './types/config.js';

export const MANIFEST_FILE = 'Cargo.toml';
export const README_FILE = 'README.md';
export const NO_DESCRIPTION = 'No description provided.';

export const CONFIG_FILE_NAMES = ['lla-docs.config.yaml', 'lla-docs.config.yml', 'lla-docs.config.json'];

export const DEFAULT_CONFIG: DocsConfig = {
  pluginsDir: 'plugins',
  outputFile: 'plugins.md',
  repositoryUrl: 'https://github.com/triyanox/lla',
  sortDirectories: true,
  readmeLinks: false,
  logging: { level: 'info' },
};
