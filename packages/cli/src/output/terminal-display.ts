import type { UserDecision } from '@costwise/shared';
import type { ChoiceOption, Display, ProgressUpdate } from '@costwise/core';
import { formatProgress } from './formatter.js';

/** The part of a readline interface the display uses. */
export interface QuestionAsker {
  question(query: string, callback: (answer: string) => void): void;
}

/** Display on a readline terminal: progress to stdout, choices by number. */
export class TerminalDisplay implements Display {
  constructor(
    private readonly rl: QuestionAsker,
    private readonly write: (line: string) => void = line => console.log(line),
  ) {}

  renderProgress(update: ProgressUpdate): void {
    for (const line of formatProgress(update)) {
      this.write(line);
    }
  }

  async presentChoice(prompt: string, options: ChoiceOption<UserDecision>[]): Promise<UserDecision> {
    this.write(prompt);
    options.forEach((option, i) => this.write(`  ${i + 1}) ${option.label}`));

    for (;;) {
      const answer = (await this.ask('> ')).trim();
      const picked = options[Number(answer) - 1];
      if (picked) return picked.value;
      this.write(`Enter a number from 1 to ${options.length}.`);
    }
  }

  private ask(query: string): Promise<string> {
    return new Promise(resolve => this.rl.question(query, resolve));
  }
}
