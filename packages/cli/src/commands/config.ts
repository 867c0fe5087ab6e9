import { Command } from 'commander';
import { ConfigManager } from '@lla-docs/core';
import { CONFIG_FILE_NAMES } from '@lla-docs/shared';

export const configCommand = new Command('config')
  .description('Inspect lla-docs configuration');

configCommand
  .command('show')
  .description('Show resolved configuration')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: { config?: string }) => {
    const mgr = new ConfigManager();
    try {
      const config = await mgr.load({ configPath: options.config });
      console.log(`# source: ${mgr.getSource() ?? 'defaults'}`);
      console.log(JSON.stringify(config, null, 2));
    } catch (err) {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  });

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(() => {
    console.log('Config files searched in the working directory and its parents (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ./${name}`));
    console.log('');
    console.log('Environment variables:');
    console.log('  LLA_DOCS_PLUGINS_DIR');
    console.log('  LLA_DOCS_OUTPUT');
    console.log('  LLA_DOCS_REPOSITORY_URL');
    console.log('  LLA_DOCS_LOG_LEVEL');
  });
