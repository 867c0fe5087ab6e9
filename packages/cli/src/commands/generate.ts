import { Command } from 'commander';
import { ConfigManager, DocGenerator, createLogger, type ConfigOverrides } from '@lla-docs/core';
import { formatGenerateSummary } from '../output/formatter.js';

export interface GenerateOptions {
  config?: string;
  pluginsDir?: string;
  output?: string;
  repositoryUrl?: string;
  sort?: boolean;
  readmeLinks?: boolean;
  verbose?: boolean;
}

export function toOverrides(options: GenerateOptions): ConfigOverrides {
  return {
    pluginsDir: options.pluginsDir,
    outputFile: options.output,
    repositoryUrl: options.repositoryUrl,
    // commander defaults --no-sort to true; only an explicit flag overrides config
    sortDirectories: options.sort === false ? false : undefined,
    readmeLinks: options.readmeLinks ? true : undefined,
    logLevel: options.verbose ? 'debug' : undefined,
  };
}

export async function runGenerate(options: GenerateOptions, cwd?: string): Promise<void> {
  const config = await new ConfigManager().load({
    configPath: options.config,
    overrides: toOverrides(options),
    cwd,
  });
  const logger = createLogger(config.logging.level);

  const result = await new DocGenerator(config, logger, { cwd }).generate();
  logger.debug(formatGenerateSummary(result));
}

export const generateCommand = new Command('generate')
  .description('Generate plugins.md from the plugin manifests')
  .option('-c, --config <path>', 'Config file (default: lla-docs.config.yaml, searched upward)')
  .option('-p, --plugins-dir <dir>', 'Plugins root directory (default: plugins)')
  .option('-o, --output <file>', 'Output Markdown file (default: plugins.md)')
  .option('--repository-url <url>', 'Repository URL used in install instructions')
  .option('--no-sort', 'Keep filesystem order instead of sorting plugin directories')
  .option('--readme-links', 'Link each plugin to its README.md when one exists')
  .option('--verbose', 'Log every plugin directory visited')
  .action(async (options: GenerateOptions) => {
    try {
      await runGenerate(options);
    } catch (err) {
      console.error(`Failed to generate: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });
