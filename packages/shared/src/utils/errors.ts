export class DocsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DocsError';
  }
}

export class ManifestParseError extends DocsError {
  constructor(
    public readonly manifestPath: string,
    public readonly reason: string,
  ) {
    super(`Invalid manifest ${manifestPath}: ${reason}`);
    this.name = 'ManifestParseError';
  }
}

export class PluginsRootError extends DocsError {
  constructor(
    public readonly root: string,
    public readonly cause: unknown,
  ) {
    super(`Cannot read plugins directory ${root}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'PluginsRootError';
  }
}

export class ConfigError extends DocsError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}
