import { Command } from 'commander';
import { ConfigManager } from '@costwise/core';
import { createToolClient } from '../setup.js';

export const toolsCommand = new Command('tools')
  .description('Inspect the tool server');

toolsCommand
  .command('list')
  .description('Connect to the configured tool server and list its tools')
  .option('-c, --config <path>', 'Path to a config file')
  .action(async (options: { config?: string }) => {
    const config = await new ConfigManager().load({ configPath: options.config });
    const client = createToolClient(config);

    try {
      const tools = await client.listTools();
      console.log(`Tools on ${config.mcp.name}:\n`);
      for (const tool of tools) {
        const tags = tool.tags?.length ? ` [${tool.tags.join(', ')}]` : '';
        console.log(`  ${tool.name}${tags}`);
        console.log(`    ${tool.description}`);
        console.log('');
      }
    } finally {
      await client.close();
    }
  });
