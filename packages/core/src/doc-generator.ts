import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { DocsConfig, GenerateResult, PluginEntry, RenderOptions } from '@lla-docs/shared';
import { listPluginDirectories, loadManifest, findReadme } from './plugin-scanner.js';
import { renderDocument } from './doc-renderer.js';
import { type Logger, silentLogger } from './logger.js';

export interface ScanResult {
  entries: PluginEntry[];
  skipped: string[];
}

export interface GeneratorOptions {
  /** Directory the config paths were resolved against; log paths are shown relative to it. */
  cwd?: string;
}

export class DocGenerator {
  constructor(
    private readonly config: DocsConfig,
    private readonly logger: Logger = silentLogger,
    private readonly options: GeneratorOptions = {},
  ) {}

  /** Loads every manifest under the plugins root, one directory at a time. */
  async scan(): Promise<ScanResult> {
    const dirs = await listPluginDirectories(this.config.pluginsDir, {
      sort: this.config.sortDirectories,
    });

    const entries: PluginEntry[] = [];
    const skipped: string[] = [];

    for (const dir of dirs) {
      const manifest = await loadManifest(dir.path);
      if (!manifest) {
        this.logger.debug(`Skipping ${dir.name}: no manifest`);
        skipped.push(dir.name);
        continue;
      }

      this.logger.debug(`Found ${manifest.name}@${manifest.version} in ${dir.name}`);
      const readme = findReadme(this.config.pluginsDir, dir);
      entries.push(readme ? { directory: dir, manifest, readme } : { directory: dir, manifest });
    }

    return { entries, skipped };
  }

  render(entries: PluginEntry[]): string {
    return renderDocument(entries, this.renderOptions());
  }

  async generate(): Promise<GenerateResult> {
    const { entries, skipped } = await this.scan();
    const content = this.render(entries);
    const outputPath = this.config.outputFile;

    await writeAtomic(outputPath, content);
    this.logger.info(`Generated ${displayPath(outputPath, this.options.cwd ?? process.cwd())}`);

    return {
      outputPath,
      entries,
      skipped,
      bytes: Buffer.byteLength(content, 'utf-8'),
    };
  }

  private renderOptions(): RenderOptions {
    return {
      repositoryUrl: this.config.repositoryUrl,
      readmeLinks: this.config.readmeLinks,
    };
  }
}

export async function generate(config: DocsConfig, logger?: Logger, options?: GeneratorOptions): Promise<GenerateResult> {
  return new DocGenerator(config, logger, options).generate();
}

function displayPath(p: string, cwd: string): string {
  const rel = path.relative(cwd, p);
  return rel && !rel.startsWith('..') && !path.isAbsolute(rel) ? rel : p;
}

// Written beside the target, then renamed over it.
async function writeAtomic(target: string, content: string): Promise<void> {
  const tmp = `${target}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmp, content, 'utf-8');
    await fs.rename(tmp, target);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}
