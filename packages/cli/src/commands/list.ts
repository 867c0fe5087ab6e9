import { Command } from 'commander';
import { ConfigManager, DocGenerator } from '@lla-docs/core';
import { formatPluginList } from '../output/formatter.js';

export const listCommand = new Command('list')
  .description('List plugins that would be documented')
  .option('-c, --config <path>', 'Config file')
  .option('-p, --plugins-dir <dir>', 'Plugins root directory')
  .action(async (options: { config?: string; pluginsDir?: string }) => {
    try {
      const config = await new ConfigManager().load({
        configPath: options.config,
        overrides: { pluginsDir: options.pluginsDir },
      });
      const scan = await new DocGenerator(config).scan();
      console.log(formatPluginList(scan));
    } catch (err) {
      console.error(`Failed to list plugins: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });
