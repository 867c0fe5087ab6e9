import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `lla-docs-${prefix}-`));
}

export function cargoToml(fields: { name?: string; version?: string; description?: string }): string {
  const lines = ['[package]'];
  if (fields.name !== undefined) lines.push(`name = "${fields.name}"`);
  if (fields.version !== undefined) lines.push(`version = "${fields.version}"`);
  if (fields.description !== undefined) lines.push(`description = "${fields.description}"`);
  lines.push('edition = "2021"', '', '[lib]', 'crate-type = ["cdylib"]', '');
  return lines.join('\n');
}

/** Creates `<root>/<dir>/` and, when given, its Cargo.toml. */
export async function addPlugin(root: string, dir: string, manifest?: string): Promise<string> {
  const pluginDir = path.join(root, dir);
  await fs.mkdir(pluginDir, { recursive: true });
  if (manifest !== undefined) {
    await fs.writeFile(path.join(pluginDir, 'Cargo.toml'), manifest, 'utf-8');
  }
  return pluginDir;
}
