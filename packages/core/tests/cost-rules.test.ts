import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { loadCostRules } from '../src/cost-rules.js';

describe('loadCostRules', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'costwise-rules-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reads a JSON rules document', async () => {
    const file = path.join(tmpDir, 'rules.json');
    await fs.writeFile(file, JSON.stringify({ analysis_goal: 'Track EC2 spend', currency: 'USD' }), 'utf-8');

    const { rules, warning } = await loadCostRules(file);

    expect(warning).toBeUndefined();
    expect(rules).toEqual({
      document: { analysis_goal: 'Track EC2 spend', currency: 'USD' },
      analysisGoal: 'Track EC2 spend',
      source: file,
    });
  });

  it('reads a YAML rules document', async () => {
    const file = path.join(tmpDir, 'rules.yaml');
    await fs.writeFile(file, 'currency: USD\nexclude:\n  - Tax\n', 'utf-8');

    const { rules } = await loadCostRules(file);

    expect(rules?.document).toEqual({ currency: 'USD', exclude: ['Tax'] });
    expect(rules?.analysisGoal).toBeUndefined();
  });

  it('degrades to no rules when the file is missing', async () => {
    const file = path.join(tmpDir, 'missing.json');

    const { rules, warning } = await loadCostRules(file);

    expect(rules).toBeNull();
    expect(warning).toMatch(new RegExp(`^Cost rules not loaded from ${file.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}: `));
  });

  it('degrades to no rules when the file does not parse', async () => {
    const file = path.join(tmpDir, 'rules.json');
    await fs.writeFile(file, '{ nope', 'utf-8');

    const { rules, warning } = await loadCostRules(file);

    expect(rules).toBeNull();
    expect(warning?.startsWith(`Cost rules in ${file} could not be parsed: `)).toBe(true);
  });

  it('rejects documents that are not objects', async () => {
    const file = path.join(tmpDir, 'rules.json');
    await fs.writeFile(file, '[1, 2]', 'utf-8');

    expect(await loadCostRules(file)).toEqual({ rules: null, warning: `Cost rules in ${file} must be an object` });
  });
});
