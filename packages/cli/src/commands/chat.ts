import { Command } from 'commander';
import * as readline from 'node:readline';
import { errorMessage, type ChatSession } from '@costwise/shared';
import { ConfigManager, SessionManager, type SessionState } from '@costwise/core';
import {
  formatBudget,
  formatHistory,
  formatSessionList,
  formatToolLog,
  formatTraceEvent,
} from '../output/formatter.js';
import { TerminalDisplay } from '../output/terminal-display.js';
import { createRuntime } from '../setup.js';

interface ChatOptions {
  resume?: string;
  list?: boolean;
  limit?: string;
  context?: string;
  config?: string;
}

const COMMANDS = '/budget, /history, /log, /rules, /clear, /save, /quit';

export const chatCommand = new Command('chat')
  .description('Ask cost questions interactively')
  .option('--resume <session-id>', 'Resume a previous session')
  .option('--list', 'List previous sessions')
  .option('--limit <n>', 'Tool calls per turn before asking to continue')
  .option('--context <n>', 'Previous question/answer pairs sent with each question (0-10)')
  .option('-c, --config <path>', 'Path to a config file')
  .action(async (options: ChatOptions) => {
    const configManager = new ConfigManager();
    await configManager.load({ configPath: options.config });
    if (options.limit !== undefined || options.context !== undefined) {
      configManager.set({
        budget: options.limit !== undefined ? { toolCallLimit: Number(options.limit) } : undefined,
        conversation: options.context !== undefined ? { contextPairs: Number(options.context) } : undefined,
      });
    }
    const config = configManager.getAll();

    const sessionManager = new SessionManager(config.conversation.sessionsDir);

    if (options.list) {
      console.log(formatSessionList(await sessionManager.list()));
      return;
    }

    const loaded: ChatSession | null = options.resume
      ? await sessionManager.load(options.resume)
      : await sessionManager.create();
    if (!loaded) {
      console.error(`Session not found: ${options.resume}`);
      process.exitCode = 1;
      return;
    }

    const runtime = await createRuntime(config, {
      onLog: event => console.error(formatTraceEvent(event)),
      onWarning: message => console.error(`Warning: ${message}`),
    });

    const { controller } = runtime;
    let state: SessionState = controller.createState(loaded, config.conversation.contextPairs);

    console.log('Cost Analysis Chat');
    console.log(`Session: ${state.session.id}`);
    console.log(`Tool calls per turn: ${config.budget.toolCallLimit} | Context pairs: ${state.contextPairs}`);
    if (options.resume) {
      console.log(`Resumed with ${state.session.messages.length} messages`);
    }
    if (runtime.rules) {
      console.log(`Cost rules: ${runtime.rules.source}`);
    }
    console.log(`Commands: ${COMMANDS}`);
    console.log('');

    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: 'costwise> ',
    });
    const display = new TerminalDisplay(rl);
    let busy = false;

    const handle = async (input: string): Promise<boolean> => {
      switch (input) {
        case '/quit':
        case '/exit':
          await sessionManager.save(state.session);
          return false;
        case '/budget':
          console.log(`Last turn: ${formatBudget(controller.getBudget().getState())}`);
          console.log(`Questions: ${state.session.metadata.messageCount} | Tool calls: ${state.session.metadata.toolCallCount} | Interruptions: ${state.session.metadata.interruptionCount}`);
          return true;
        case '/history':
          console.log(formatHistory(state.session.messages));
          return true;
        case '/log': {
          const last = [...state.session.messages].reverse().find(m => m.role === 'assistant');
          console.log(formatToolLog(last?.toolLog ?? []));
          return true;
        }
        case '/rules':
          console.log(runtime.rules
            ? JSON.stringify(runtime.rules.document, null, 2)
            : 'No cost rules loaded.');
          return true;
        case '/clear':
          state = controller.clear(state);
          console.log('Conversation cleared.');
          return true;
        case '/save':
          await sessionManager.save(state.session);
          console.log(`Session saved: ${state.session.id}`);
          return true;
      }

      if (input.startsWith('/')) {
        console.log(`Unknown command. Commands: ${COMMANDS}`);
        return true;
      }

      console.log('');
      const result = await controller.converse(state, input, display);
      state = result.state;

      switch (result.outcome.kind) {
        case 'completed':
        case 'stopped':
        case 'failed':
          console.log('');
          console.log(result.outcome.content);
          console.log('');
          break;
        case 'ignored':
          console.log(result.outcome.reason);
          break;
        case 'interrupted':
          break;
      }

      await sessionManager.save(state.session);
      return true;
    };

    rl.prompt();

    rl.on('line', (line: string) => {
      const input = line.trim();
      if (!input || busy) {
        if (!busy) rl.prompt();
        return;
      }

      busy = true;
      handle(input)
        .then(keepGoing => {
          if (keepGoing) {
            rl.prompt();
          } else {
            rl.close();
          }
        })
        .catch(err => {
          console.error(`Error: ${errorMessage(err)}`);
          rl.prompt();
        })
        .finally(() => {
          busy = false;
        });
    });

    rl.on('close', () => {
      runtime.shutdown()
        .catch(err => console.error(`Error during shutdown: ${errorMessage(err)}`))
        .finally(() => process.exit(0));
    });
  });
