import type { GenerateResult } from '@lla-docs/shared';
import type { ScanResult } from '@lla-docs/core';

export function formatGenerateSummary(result: GenerateResult): string {
  const lines: string[] = [];
  lines.push(`Documented ${pluralize(result.entries.length, 'plugin')} (${formatBytes(result.bytes)})`);
  if (result.skipped.length > 0) {
    lines.push(`Skipped (no Cargo.toml): ${result.skipped.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatPluginList(scan: ScanResult): string {
  if (scan.entries.length === 0) {
    return scan.skipped.length > 0
      ? `No plugins found.\nSkipped: ${scan.skipped.join(', ')}`
      : 'No plugins found.';
  }

  const lines: string[] = [];
  lines.push(`Plugins (${scan.entries.length}):`);
  lines.push('');
  for (const e of scan.entries) {
    lines.push(`  ${e.manifest.name}@${e.manifest.version} (${e.directory.name})`);
    if (e.manifest.description) {
      lines.push(`    ${e.manifest.description}`);
    }
  }
  if (scan.skipped.length > 0) {
    lines.push('');
    lines.push(`Skipped: ${scan.skipped.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  return `${(bytes / 1024).toFixed(1)} KB`;
}

function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
