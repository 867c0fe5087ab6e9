export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingConfig {
  level: LogLevel;
}

export interface DocsConfig {
  pluginsDir: string;
  outputFile: string;
  repositoryUrl: string;
  sortDirectories: boolean;
  readmeLinks: boolean;
  logging: LoggingConfig;
}

export interface RenderOptions {
  repositoryUrl: string;
  readmeLinks: boolean;
}
