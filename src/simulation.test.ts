/**
 * Run Loop Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { SimulationObserver, SimulationSummary, TickRecord } from './core/types.js';
import { Grid } from './room/grid.js';
import { createVacuumCleaner } from './agent/vacuum-cleaner.js';
import { TickLimitExceededError } from './core/errors.js';
import { runSimulation, runSimulationPaced, createLoggingObserver } from './simulation.js';

function recordingObserver(): SimulationObserver & { ticks: TickRecord[]; summaries: SimulationSummary[] } {
  const ticks: TickRecord[] = [];
  const summaries: SimulationSummary[] = [];
  return {
    ticks,
    summaries,
    onTick: (record) => ticks.push(record),
    onFinish: (summary) => summaries.push(summary),
  };
}

describe('runSimulation', () => {
  it('should halt once the room is clean and report the total cost', () => {
    const observer = recordingObserver();
    const agent = createVacuumCleaner({ startPosition: 0 }, new Grid([0, 0, 1]));

    const summary = runSimulation(agent, { observer });

    expect(observer.ticks.map((t) => [t.previousPosition, t.position, t.action])).toEqual([
      [0, 1, 'move_right'],
      [1, 2, 'move_right'],
      [1, 2, 'suck'],
    ]);
    expect(summary).toEqual({
      status: 'DONE',
      ticks: 3,
      totalCost: 3,
      totalPerformance: -3,
      finalPosition: 2,
      actionCounts: { move_left: 0, move_right: 2, suck: 1 },
      room: [0, 0, 0],
    });
    expect(observer.summaries).toEqual([summary]);
  });

  it('should sweep the default room left to right', () => {
    const observer = recordingObserver();
    const agent = createVacuumCleaner({}, new Grid([0, 0, 1, 0, 1, 0, 1]));

    const summary = runSimulation(agent, { observer });

    expect(summary.totalCost).toBe(9);
    expect(summary.actionCounts).toEqual({ move_left: 0, move_right: 6, suck: 3 });
    expect(observer.ticks.map((t) => t.room.join(''))).toEqual([
      '0010101',
      '0010101',
      '0000101',
      '0000101',
      '0000101',
      '0000001',
      '0000001',
      '0000001',
      '0000000',
    ]);
  });

  it('should finish without acting on a clean room', () => {
    const observer = recordingObserver();
    const summary = runSimulation(createVacuumCleaner({}, new Grid([0])), { observer });

    expect(observer.ticks).toHaveLength(0);
    expect(summary.status).toBe('DONE');
    expect(summary.totalCost).toBe(0);
  });

  it('should throw TickLimitExceededError past the tick bound', () => {
    const agent = createVacuumCleaner({}, new Grid([0, 0, 1, 0, 1, 0, 1]));
    expect(() => runSimulation(agent, { maxTicks: 5, observer: {} })).toThrow(TickLimitExceededError);
    expect(agent.getState().tick).toBe(5);
  });

  it('should not trip the bound when the last allowed tick finishes the room', () => {
    const agent = createVacuumCleaner({}, new Grid([0, 0, 1]));
    expect(runSimulation(agent, { maxTicks: 3, observer: {} }).status).toBe('DONE');
  });
});

describe('runSimulationPaced', () => {
  it('should produce the same run as the synchronous loop', async () => {
    const observer = recordingObserver();
    const agent = createVacuumCleaner({ startPosition: 1 }, new Grid([1, 0, 1]));

    const summary = await runSimulationPaced(agent, { observer, tickIntervalMs: 1 });

    expect(observer.ticks.map((t) => t.action)).toEqual(['move_left', 'suck', 'move_right', 'move_right', 'suck']);
    expect(summary.status).toBe('DONE');
    expect(summary.totalCost).toBe(5);
  });

  it('should stop between ticks when aborted', async () => {
    const controller = new AbortController();
    const agent = createVacuumCleaner({}, new Grid([0, 0, 1, 0, 1, 0, 1]));

    const summary = await runSimulationPaced(agent, {
      signal: controller.signal,
      observer: { onTick: () => controller.abort() },
    });

    expect(summary.status).toBe('RUNNING');
    expect(summary.ticks).toBe(1);
    expect(summary.finalPosition).toBe(1);
  });

  it('should reject past the tick bound', async () => {
    const agent = createVacuumCleaner({}, new Grid([1, 0, 0, 0, 1]));
    await expect(runSimulationPaced(agent, { maxTicks: 2, observer: {} })).rejects.toThrow(
      'Room not clean after 2 ticks'
    );
  });
});

describe('createLoggingObserver', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log every tick and the final cost as JSON lines', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const agent = createVacuumCleaner({ name: 'robo' }, new Grid([0, 1]));

    runSimulation(agent, { observer: createLoggingObserver(agent.name) });

    const lines = spy.mock.calls.map((call) => JSON.parse(String(call[0])));
    expect(lines.map((l) => l.step)).toEqual(['tick', 'tick', 'finished']);
    expect(lines[0]).toMatchObject({
      agent: 'robo',
      tick: 1,
      cost: 1,
      details: { previousPosition: 0, position: 1, action: 'move_right', room: '01' },
    });
    expect(lines[2]).toMatchObject({ agent: 'robo', tick: 2, cost: 2, details: { room: '00' } });
  });
});
