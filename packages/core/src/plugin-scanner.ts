import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { existsSync, type Dirent } from 'node:fs';
import { parse as parseToml } from 'smol-toml';
import {
  type PluginDirectory,
  type PluginManifest,
  cargoManifestSchema,
  MANIFEST_FILE,
  README_FILE,
  ManifestParseError,
  PluginsRootError,
} from '@lla-docs/shared';

export interface ListOptions {
  /** Sort by directory name. Off keeps whatever order readdir yields. */
  sort?: boolean;
}

export async function listPluginDirectories(root: string, options: ListOptions = {}): Promise<PluginDirectory[]> {
  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(root, { withFileTypes: true });
  } catch (err) {
    throw new PluginsRootError(root, err);
  }

  const dirs: PluginDirectory[] = [];
  for (const d of dirents) {
    const dirPath = path.join(root, d.name);
    if (d.isDirectory() || (d.isSymbolicLink() && await isDirectory(dirPath))) {
      dirs.push({ name: d.name, path: dirPath });
    }
  }

  if (options.sort ?? true) {
    dirs.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
  return dirs;
}

/**
 * Reads `<pluginDir>/Cargo.toml`. Returns null when the file is absent and
 * throws ManifestParseError when it exists but cannot be used.
 */
export async function loadManifest(pluginDir: string): Promise<PluginManifest | null> {
  const manifestPath = path.join(pluginDir, MANIFEST_FILE);

  let content: string;
  try {
    content = await fs.readFile(manifestPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (err) {
    throw new ManifestParseError(manifestPath, err instanceof Error ? err.message : String(err));
  }

  const result = cargoManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new ManifestParseError(
      manifestPath,
      result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', '),
    );
  }

  const { name, version, description } = result.data.package;
  return description === undefined ? { name, version } : { name, version, description };
}

/** Link to the plugin README, relative to the plugins root's parent. */
export function findReadme(pluginsRoot: string, dir: PluginDirectory): string | undefined {
  if (!existsSync(path.join(dir.path, README_FILE))) return undefined;
  return [path.basename(pluginsRoot), dir.name, README_FILE].join('/');
}

// Follows links; a dangling link is not a directory.
async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
