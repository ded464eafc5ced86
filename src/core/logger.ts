/**
 * Reflex Vacuum - Logger
 *
 * JSON line logging for structured output.
 * Format: { ts, agent, step, tick, cost?, details? }
 */

import type {
  ActionKind,
  Candidate,
  LogEntry,
  Percept,
  SimulationSummary,
  TickRecord,
} from './types.js';

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function log(entry: Omit<LogEntry, 'ts'>): void {
  const fullEntry: LogEntry = {
    ts: new Date().toISOString(),
    ...entry,
  };
  console.log(JSON.stringify(fullEntry));
}

export function logVerbose(entry: Omit<LogEntry, 'ts'>): void {
  if (!verbose) return;
  log(entry);
}

export function logError(agent: string | null, tick: number, error: unknown, context?: string): void {
  log({
    agent,
    step: 'error',
    tick,
    details: {
      context,
      name: error instanceof Error ? error.name : undefined,
      message: error instanceof Error ? error.message : String(error),
    },
  });
}

export function logPercept(agent: string, tick: number, position: number, percept: Percept): void {
  logVerbose({
    agent,
    step: 'percept',
    tick,
    details: { position, ...percept },
  });
}

export function logCandidates(
  agent: string,
  tick: number,
  candidates: Candidate[],
  avoid: ActionKind | null
): void {
  logVerbose({
    agent,
    step: 'candidates',
    tick,
    details: {
      candidates: Object.fromEntries(candidates.map((c) => [c.action, c.score])),
      avoid,
    },
  });
}

export function logTick(agent: string, record: TickRecord): void {
  log({
    agent,
    step: 'tick',
    tick: record.tick,
    cost: record.cost,
    details: {
      previousPosition: record.previousPosition,
      position: record.position,
      action: record.action,
      room: record.room.join(''),
    },
  });
}

export function logFinished(agent: string, summary: SimulationSummary): void {
  log({
    agent,
    step: 'finished',
    tick: summary.ticks,
    cost: summary.totalCost,
    details: {
      totalPerformance: summary.totalPerformance,
      finalPosition: summary.finalPosition,
      actionCounts: summary.actionCounts,
      room: summary.room.join(''),
    },
  });
}
