import { Command } from 'commander';
import { ConfigManager, SessionManager } from '@costwise/core';
import { formatSessionList } from '../output/formatter.js';

async function sessionManager(configPath?: string): Promise<SessionManager> {
  const config = await new ConfigManager().load({ configPath });
  return new SessionManager(config.conversation.sessionsDir);
}

export const sessionsCommand = new Command('sessions')
  .description('Manage saved chat sessions');

sessionsCommand
  .command('list')
  .description('List saved sessions, most recent first')
  .option('-c, --config <path>', 'Path to a config file')
  .action(async (options: { config?: string }) => {
    const manager = await sessionManager(options.config);
    console.log(formatSessionList(await manager.list()));
  });

sessionsCommand
  .command('delete <session-id>')
  .description('Delete a saved session')
  .option('-c, --config <path>', 'Path to a config file')
  .action(async (id: string, options: { config?: string }) => {
    const manager = await sessionManager(options.config);
    if (await manager.delete(id)) {
      console.log(`Deleted ${id}`);
    } else {
      console.error(`Session not found: ${id}`);
      process.exitCode = 1;
    }
  });
