export interface PluginManifest {
  name: string;
  version: string;
  description?: string;
}

export interface PluginDirectory {
  /** Directory name, used as the install path segment. */
  name: string;
  path: string;
}

export interface PluginEntry {
  directory: PluginDirectory;
  manifest: PluginManifest;
  /** Relative link to the plugin's README.md, when one exists. */
  readme?: string;
}

export interface GenerateResult {
  outputPath: string;
  entries: PluginEntry[];
  skipped: string[];
  bytes: number;
}
