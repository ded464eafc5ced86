/**
 * Reflex Vacuum - Agent
 */

export { VacuumCleaner, createVacuumCleaner, execute } from './vacuum-cleaner.js';
export { RULES, scoreOf, deriveConditions, evaluateRules } from './rules.js';
export { avoidanceTarget, pickAction } from './selection.js';
