import { type PluginEntry, type RenderOptions, NO_DESCRIPTION } from '@lla-docs/shared';

export function renderHeader(options: RenderOptions): string {
  const lines: string[] = [];

  lines.push('# LLA Plugins');
  lines.push('');
  lines.push('This document lists all available plugins for LLA and provides installation instructions.');
  lines.push('');
  lines.push('## Installation');
  lines.push('');
  lines.push('You can install all plugins at once using:');
  lines.push('');
  lines.push('```bash');
  lines.push(`lla install --git ${options.repositoryUrl}`);
  lines.push('```');
  lines.push('');
  lines.push('Or you can install individual plugins as described below.');
  lines.push('');
  lines.push('## Available Plugins');
  lines.push('');
  lines.push('');

  return lines.join('\n');
}

export function renderPluginSection(entry: PluginEntry, options: RenderOptions): string {
  const { manifest, directory } = entry;
  const lines: string[] = [];

  lines.push(`### ${manifest.name}`);
  lines.push('');
  lines.push(`**Description:** ${manifest.description ?? NO_DESCRIPTION}`);
  lines.push('');
  lines.push(`**Version:** ${manifest.version}`);
  lines.push('');
  if (options.readmeLinks && entry.readme) {
    lines.push(`**Documentation:** [Documentation](${entry.readme})`);
    lines.push('');
  }
  lines.push('**Installation Options:**');
  lines.push('');

  lines.push('1. Using LLA install command:');
  lines.push('```bash');
  lines.push(`lla install --dir path/to/lla/plugins/${directory.name}`);
  lines.push('```');
  lines.push('');

  lines.push('2. Manual installation:');
  lines.push('```bash');
  lines.push(`git clone ${options.repositoryUrl}`);
  lines.push(`cd lla/plugins/${directory.name}`);
  lines.push('cargo build --release');
  lines.push('```');
  lines.push('');
  lines.push('Then, copy the generated `.so`, `.dll`, or `.dylib` file from the `target/release` directory to your LLA plugins directory.');
  lines.push('');
  lines.push('');

  return lines.join('\n');
}

export function renderDocument(entries: PluginEntry[], options: RenderOptions): string {
  return renderHeader(options) + entries.map(e => renderPluginSection(e, options)).join('');
}
