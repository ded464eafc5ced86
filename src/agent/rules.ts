/**
 * Condition-action rules
 *
 * The percept is reduced to conditions once per tick; each rule offers one
 * action when its predicate holds on them. Appending a rule needs no change
 * to selection.
 */

import type { Candidate, Conditions, Percept, Rule } from '../core/types.js';

const MOVE_COST = 1;
const SUCK_COST = 1;

/** Table order is the candidate order: ties in selection resolve move_left, move_right, suck. */
export const RULES: readonly Rule[] = [
  {
    action: 'move_left',
    when: (c) => c.canMoveLeft,
    performance: -1,
    cost: MOVE_COST,
  },
  {
    action: 'move_right',
    when: (c) => c.canMoveRight,
    performance: -1,
    cost: MOVE_COST,
  },
  {
    action: 'suck',
    when: (c) => c.shouldSuck,
    performance: 1,
    cost: SUCK_COST,
  },
];

export function scoreOf(rule: Rule): number {
  return rule.performance - rule.cost;
}

export function deriveConditions(percept: Percept): Conditions {
  return {
    canMoveLeft: percept.left !== null,
    canMoveRight: percept.right !== null,
    shouldSuck: percept.centre === 1,
  };
}

export function evaluateRules(percept: Percept, rules: readonly Rule[] = RULES): Candidate[] {
  const conditions = deriveConditions(percept);
  const candidates: Candidate[] = [];
  for (const rule of rules) {
    if (rule.when(conditions)) {
      candidates.push({ action: rule.action, score: scoreOf(rule) });
    }
  }
  return candidates;
}
