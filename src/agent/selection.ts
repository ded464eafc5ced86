/**
 * Action selection with loop avoidance
 */

import type { ActionKind, Candidate } from '../core/types.js';
import { NoLegalActionError } from '../core/errors.js';

/**
 * The move that would send the agent straight back where it came from.
 */
export function avoidanceTarget(previousPosition: number, position: number): ActionKind | null {
  if (previousPosition === position - 1) return 'move_left';
  if (previousPosition === position + 1) return 'move_right';
  return null;
}

/**
 * Highest score wins; ties go to the earliest candidate. `avoid` may not
 * win, unless nothing else can, in which case the first candidate is taken.
 */
export function pickAction(candidates: readonly Candidate[], avoid: ActionKind | null = null): ActionKind {
  const first = candidates[0];
  if (!first) {
    throw new NoLegalActionError();
  }

  let best: Candidate | null = null;
  for (const candidate of candidates) {
    if (candidate.action === avoid) continue;
    if (best === null || candidate.score > best.score) {
      best = candidate;
    }
  }

  return (best ?? first).action;
}
