import { Command } from 'commander';
import { CONFIG_FILE_NAMES } from '@costwise/shared';
import { ConfigManager } from '@costwise/core';

/** API keys are shown only by their last four characters. */
export function redactKey(key: string): string {
  return key.length <= 4 ? '****' : `****${key.slice(-4)}`;
}

export const configCommand = new Command('config')
  .description('Manage configuration');

configCommand
  .command('show')
  .description('Show the effective configuration')
  .option('-c, --config <path>', 'Path to a config file')
  .action(async (options: { config?: string }) => {
    const mgr = new ConfigManager();
    const config = await mgr.load({ configPath: options.config });
    console.log(`# source: ${mgr.getSource() ?? 'defaults and environment'}`);
    console.log(JSON.stringify(config, (key, value: unknown) =>
      key === 'apiKey' && typeof value === 'string' ? redactKey(value) : value, 2));
  });

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(() => {
    console.log('Config files searched upward from the working directory (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ./${name}`));
    console.log('');
    console.log('Environment variables:');
    console.log('  COSTWISE_ANTHROPIC_API_KEY');
    console.log('  COSTWISE_OPENAI_API_KEY');
    console.log('  COSTWISE_PROVIDER');
    console.log('  COSTWISE_TOOL_CALL_LIMIT');
    console.log('  COSTWISE_CONTEXT_PAIRS');
    console.log('  COSTWISE_COST_RULES');
    console.log('  COSTWISE_LOG_LEVEL');
  });
