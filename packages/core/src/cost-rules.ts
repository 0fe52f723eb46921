import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { errorMessage } from '@costwise/shared';

export interface CostRules {
  /** The rules document as written, spliced into the system prompt. */
  document: Record<string, unknown>;
  analysisGoal?: string;
  source: string;
}

export interface CostRulesLoadResult {
  rules: CostRules | null;
  warning?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the cost calculation rules. A missing or unreadable file leaves the
 * assistant without rules and reports why.
 */
export async function loadCostRules(path: string): Promise<CostRulesLoadResult> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    return { rules: null, warning: `Cost rules not loaded from ${path}: ${errorMessage(err)}` };
  }

  let parsed: unknown;
  try {
    const ext = extname(path).toLowerCase();
    parsed = ext === '.yaml' || ext === '.yml' ? parseYaml(raw) : JSON.parse(raw);
  } catch (err) {
    return { rules: null, warning: `Cost rules in ${path} could not be parsed: ${errorMessage(err)}` };
  }

  if (!isRecord(parsed)) {
    return { rules: null, warning: `Cost rules in ${path} must be an object` };
  }

  const goal = parsed['analysis_goal'];
  return {
    rules: {
      document: parsed,
      analysisGoal: typeof goal === 'string' ? goal : undefined,
      source: path,
    },
  };
}
