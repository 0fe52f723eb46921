#!/usr/bin/env tsx
import { Command } from 'commander';
import { errorMessage } from '@costwise/shared';
import { chatCommand } from '../src/commands/chat.js';
import { configCommand } from '../src/commands/config.js';
import { toolsCommand } from '../src/commands/tools.js';
import { sessionsCommand } from '../src/commands/sessions.js';

const program = new Command();

program
  .name('costwise')
  .description('Conversational cloud cost analysis over a cost and usage report')
  .version('0.1.0');

program.addCommand(chatCommand);
program.addCommand(configCommand);
program.addCommand(toolsCommand);
program.addCommand(sessionsCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
