import { MAX_CONTEXT_PAIRS, type DatasetConfig, type SessionMessage } from '@costwise/shared';
import type { CostRules } from './cost-rules.js';

export interface SystemPromptOptions {
  rules: CostRules | null;
  dataset: DatasetConfig;
}

export function buildSystemPrompt({ rules, dataset }: SystemPromptOptions): string {
  const sections = [
    'You are a cloud cost analysis assistant. You answer questions about cloud spending by querying the cost and usage report with the tools available to you.',
  ];

  if (rules?.analysisGoal) {
    sections.push(`## Analysis Goal\n${rules.analysisGoal}`);
  }

  if (rules) {
    sections.push(
      `## Cost Calculation Rules\nFollow these rules exactly when computing costs:\n${JSON.stringify(rules.document, null, 2)}`,
    );
  }

  sections.push(`## Dataset
- Cluster: ${dataset.cluster}
- Database: ${dataset.database}
- Schema: ${dataset.schema}
- Table: ${dataset.table}

Query only this table. Keep queries focused and aggregate in SQL rather than fetching raw rows.`);

  return sections.join('\n\n');
}

/**
 * Prefixes the question with the most recent exchanges. `pairs` is clamped to
 * 0..MAX_CONTEXT_PAIRS; with nothing to show the question goes out alone.
 */
export function buildTurnPrompt(history: SessionMessage[], question: string, pairs: number): string {
  const count = Math.max(0, Math.min(MAX_CONTEXT_PAIRS, Math.floor(pairs)));
  if (count === 0 || history.length === 0) return question;

  const recent = history.slice(-count * 2);
  const lines = recent.map(m => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`);

  return [
    '[Previous conversation]',
    lines.join('\n\n'),
    '',
    '[Current question]',
    question,
    '',
    'Answer the current question taking the conversation above into account.',
  ].join('\n');
}
