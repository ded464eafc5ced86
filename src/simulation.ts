/**
 * Reflex Vacuum - Run Loop
 *
 * RUNNING until the room is fully clean, then DONE. The loop is bounded by
 * `maxTicks`: nothing proves the avoidance rule rules out every cycle.
 */

import type { SimulationObserver, SimulationSummary, TickRecord } from './core/types.js';
import { TickLimitExceededError } from './core/errors.js';
import { logFinished, logTick } from './core/logger.js';
import type { VacuumCleaner } from './agent/vacuum-cleaner.js';

export const DEFAULT_MAX_TICKS = 10_000;

export interface SimulationOptions {
  /** Safety bound on executed actions */
  maxTicks?: number;
  /** Receives every tick and the final summary; defaults to the JSON logger */
  observer?: SimulationObserver;
}

export interface PacedSimulationOptions extends SimulationOptions {
  /** Pause after each tick, for watching the run */
  tickIntervalMs?: number;
  /** Stops the loop between ticks */
  signal?: AbortSignal;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createLoggingObserver(agentName: string): SimulationObserver {
  return {
    onTick: (record: TickRecord) => logTick(agentName, record),
    onFinish: (summary: SimulationSummary) => logFinished(agentName, summary),
  };
}

export function summarize(agent: VacuumCleaner): SimulationSummary {
  const state = agent.getState();
  return {
    status: agent.isDone() ? 'DONE' : 'RUNNING',
    ticks: state.tick,
    totalCost: state.cumulativeCost,
    totalPerformance: state.cumulativePerformance,
    finalPosition: state.position,
    actionCounts: state.actionCounts,
    room: agent.getGrid().snapshot(),
  };
}

/**
 * Advance one tick under the bound. Returns the tick record, or null once
 * the room is clean.
 */
function advance(agent: VacuumCleaner, maxTicks: number): TickRecord | null {
  if (agent.isDone()) return null;
  if (agent.getState().tick >= maxTicks) {
    throw new TickLimitExceededError(maxTicks);
  }

  const outcome = agent.step();
  return outcome.status === 'acted' ? outcome.record : null;
}

export function runSimulation(agent: VacuumCleaner, options: SimulationOptions = {}): SimulationSummary {
  const maxTicks = options.maxTicks ?? DEFAULT_MAX_TICKS;
  const observer = options.observer ?? createLoggingObserver(agent.name);

  let record = advance(agent, maxTicks);
  while (record !== null) {
    observer.onTick?.(record);
    record = advance(agent, maxTicks);
  }

  const summary = summarize(agent);
  observer.onFinish?.(summary);
  return summary;
}

export async function runSimulationPaced(
  agent: VacuumCleaner,
  options: PacedSimulationOptions = {}
): Promise<SimulationSummary> {
  const maxTicks = options.maxTicks ?? DEFAULT_MAX_TICKS;
  const observer = options.observer ?? createLoggingObserver(agent.name);
  const tickIntervalMs = options.tickIntervalMs ?? 0;

  while (!options.signal?.aborted) {
    const record = advance(agent, maxTicks);
    if (record === null) break;
    observer.onTick?.(record);

    if (tickIntervalMs > 0) {
      await sleep(tickIntervalMs);
    }
  }

  const summary = summarize(agent);
  observer.onFinish?.(summary);
  return summary;
}
