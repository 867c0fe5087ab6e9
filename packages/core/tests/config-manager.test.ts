import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ConfigError } from '@lla-docs/shared';
import { ConfigManager } from '../src/config-manager.js';
import { makeTempDir } from './helpers.js';

describe('ConfigManager', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await makeTempDir('config');
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
  });

  it('resolves the defaults against the working directory', async () => {
    const config = await new ConfigManager().load({ cwd, env: {} });

    expect(config).toEqual({
      pluginsDir: path.join(cwd, 'plugins'),
      outputFile: path.join(cwd, 'plugins.md'),
      repositoryUrl: 'https://github.com/triyanox/lla',
      sortDirectories: true,
      readmeLinks: false,
      logging: { level: 'info' },
    });
  });

  it('reads a YAML config file from the working directory', async () => {
    await fs.writeFile(
      path.join(cwd, 'lla-docs.config.yaml'),
      'outputFile: docs/plugins.md\nsortDirectories: false\nlogging:\n  level: warn\n',
      'utf-8',
    );

    const mgr = new ConfigManager();
    const config = await mgr.load({ cwd, env: {} });

    expect(config.outputFile).toBe(path.join(cwd, 'docs', 'plugins.md'));
    expect(config.sortDirectories).toBe(false);
    expect(config.logging.level).toBe('warn');
    expect(config.readmeLinks).toBe(false);
    expect(mgr.getSource()).toBe(path.join(cwd, 'lla-docs.config.yaml'));
  });

  it('finds a config file in a parent directory', async () => {
    await fs.writeFile(path.join(cwd, 'lla-docs.config.json'), JSON.stringify({ pluginsDir: 'crates' }), 'utf-8');
    const nested = path.join(cwd, 'a', 'b');
    await fs.mkdir(nested, { recursive: true });

    const config = await new ConfigManager().load({ cwd: nested, env: {} });
    expect(config.pluginsDir).toBe(path.join(nested, 'crates'));
  });

  it('treats an empty YAML file as no settings', async () => {
    await fs.writeFile(path.join(cwd, 'lla-docs.config.yml'), '', 'utf-8');

    const config = await new ConfigManager().load({ cwd, env: {} });
    expect(config.outputFile).toBe(path.join(cwd, 'plugins.md'));
  });

  it('lets environment variables override the file', async () => {
    await fs.writeFile(path.join(cwd, 'lla-docs.config.yaml'), 'outputFile: from-file.md\n', 'utf-8');

    const config = await new ConfigManager().load({
      cwd,
      env: {
        LLA_DOCS_OUTPUT: 'from-env.md',
        LLA_DOCS_REPOSITORY_URL: 'https://example.com/lla',
        LLA_DOCS_LOG_LEVEL: 'debug',
      },
    });

    expect(config.outputFile).toBe(path.join(cwd, 'from-env.md'));
    expect(config.repositoryUrl).toBe('https://example.com/lla');
    expect(config.logging.level).toBe('debug');
  });

  it('lets overrides win over environment variables', async () => {
    const config = await new ConfigManager().load({
      cwd,
      env: { LLA_DOCS_PLUGINS_DIR: 'env-plugins' },
      overrides: { pluginsDir: 'cli-plugins', readmeLinks: true, logLevel: 'error' },
    });

    expect(config.pluginsDir).toBe(path.join(cwd, 'cli-plugins'));
    expect(config.readmeLinks).toBe(true);
    expect(config.logging.level).toBe('error');
  });

  it('ignores undefined overrides', async () => {
    const config = await new ConfigManager().load({
      cwd,
      env: {},
      overrides: { pluginsDir: undefined, sortDirectories: undefined },
    });

    expect(config.pluginsDir).toBe(path.join(cwd, 'plugins'));
    expect(config.sortDirectories).toBe(true);
  });

  it('rejects an invalid log level', async () => {
    await expect(
      new ConfigManager().load({ cwd, env: { LLA_DOCS_LOG_LEVEL: 'verbose' } }),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects an invalid repository URL', async () => {
    await fs.writeFile(path.join(cwd, 'lla-docs.config.yaml'), 'repositoryUrl: not a url\n', 'utf-8');
    await expect(new ConfigManager().load({ cwd, env: {} })).rejects.toThrow(/repositoryUrl/);
  });

  it('rejects an explicit config path that does not exist', async () => {
    await expect(
      new ConfigManager().load({ cwd, env: {}, configPath: 'missing.yaml' }),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a config file that is not a mapping', async () => {
    await fs.writeFile(path.join(cwd, 'custom.yaml'), '- one\n- two\n', 'utf-8');
    await expect(
      new ConfigManager().load({ cwd, env: {}, configPath: 'custom.yaml' }),
    ).rejects.toThrow('custom.yaml must contain a mapping');
  });
});
