/**
 * Unit tests for the Rule Catalog
 */

import { describe, it, expect } from 'vitest';
import { RULE_CATALOG, isRuleName, listRules, lookupRule } from '../../src/rules/catalog.js';
import { RULE_NAMES } from '../../src/shared/types.js';

describe('Rule Catalog', () => {
  it('holds 24 distinct rules keyed by their own name', () => {
    const names = Object.keys(RULE_CATALOG);
    expect(names).toHaveLength(24);
    expect(new Set(names).size).toBe(24);
    for (const name of RULE_NAMES) {
      expect(RULE_CATALOG[name].name).toBe(name);
    }
  });

  it('every rule has a positive reward and a known difficulty', () => {
    for (const rule of listRules()) {
      expect(rule.reward).toBeGreaterThan(0);
      expect(['easy', 'medium', 'hard', 'very_hard']).toContain(rule.difficulty);
      expect(rule.description.length).toBeGreaterThan(0);
    }
  });

  it('is frozen', () => {
    expect(Object.isFrozen(RULE_CATALOG)).toBe(true);
  });

  it('freezes every definition it hands out', () => {
    for (const name of RULE_NAMES) {
      expect(Object.isFrozen(RULE_CATALOG[name])).toBe(true);
    }
    const rule = lookupRule('team_collaboration');
    expect(rule).not.toBeNull();
    expect(Object.isFrozen(rule)).toBe(true);
    expect(Reflect.set(RULE_CATALOG.team_collaboration, 'reward', 999)).toBe(false);
    expect(RULE_CATALOG.team_collaboration.reward).toBe(40);
  });

  it('listRules returns summaries in catalog order without evaluators', () => {
    const rules = listRules();
    expect(rules.map((r) => r.name)).toEqual([...RULE_NAMES]);
    expect(rules[0]).toEqual({
      name: 'create_urgent_task',
      description: "Create a new task with 'urgent' priority",
      reward: 10,
      difficulty: 'easy',
    });
    expect(rules[20]).toMatchObject({ name: 'clean_slate', reward: 50, difficulty: 'very_hard' });
  });

  it('lookupRule returns null for unknown names', () => {
    expect(lookupRule('does_not_exist')).toBeNull();
    expect(lookupRule('')).toBeNull();
    expect(lookupRule('complete_three_tasks')?.reward).toBe(15);
  });

  it('isRuleName is exact and case-sensitive', () => {
    expect(isRuleName('reduce_wip')).toBe(true);
    expect(isRuleName('REDUCE_WIP')).toBe(false);
    expect(isRuleName('toString')).toBe(false);
  });
});
