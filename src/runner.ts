#!/usr/bin/env node
/**
 * Reflex Vacuum - Runner
 *
 * Main entry point: builds the room from config, drops the agent in and
 * runs until the room is clean.
 */

import {
  loadConfig,
  parseCliArgs,
  mergeConfig,
  validateConfig,
  setVerbose,
  log,
  logError,
  SeededRNG,
  InvalidRoomError,
  type VacuumConfig,
  type DirtFlag,
  type SimulationSummary,
} from './core/index.js';
import { Grid, generateRoom, parseRoomString, readRoomFile } from './room/index.js';
import { createVacuumCleaner } from './agent/index.js';
import { runSimulationPaced } from './simulation.js';

async function resolveRoom(config: VacuumConfig): Promise<{ room: DirtFlag[]; source: string }> {
  if (config.roomFile) {
    return { room: await readRoomFile(config.roomFile), source: config.roomFile };
  }

  if (config.randomLength > 0) {
    const rng = new SeededRNG(config.seed);
    return {
      room: generateRoom(rng, config.randomLength, config.dirtProbability),
      source: `random(seed=${config.seed})`,
    };
  }

  const { room, validation } = parseRoomString(config.room);
  if (!room) {
    throw new InvalidRoomError(validation.errors);
  }
  return { room, source: 'inline' };
}

async function main(): Promise<void> {
  const envConfig = loadConfig();
  const cliOverrides = parseCliArgs(process.argv.slice(2));
  const config = validateConfig(mergeConfig(envConfig, cliOverrides));

  setVerbose(config.verbose);

  log({
    agent: null,
    step: 'runner_start',
    tick: 0,
    details: {
      startPosition: config.startPosition,
      tickIntervalMs: config.tickIntervalMs,
      maxTicks: config.maxTicks,
    },
  });

  const { room, source } = await resolveRoom(config);
  const grid = new Grid(room);
  log({
    agent: null,
    step: 'room_loaded',
    tick: 0,
    details: { source, size: grid.size, dirty: grid.dirtyCount(), room: grid.toString() },
  });

  const agent = createVacuumCleaner({ startPosition: config.startPosition }, grid);

  // Graceful shutdown between ticks
  const controller = new AbortController();
  const shutdown = (reason: string) => () => {
    log({
      agent: agent.name,
      step: 'runner_shutdown',
      tick: agent.getState().tick,
      details: { reason },
    });
    controller.abort();
  };
  process.on('SIGINT', shutdown('SIGINT'));
  process.on('SIGTERM', shutdown('SIGTERM'));

  let summary: SimulationSummary;
  try {
    summary = await runSimulationPaced(agent, {
      maxTicks: config.maxTicks,
      tickIntervalMs: config.tickIntervalMs,
      signal: controller.signal,
    });
  } catch (error) {
    logError(agent.name, agent.getState().tick, error, 'simulation');
    throw error;
  }

  if (summary.status !== 'DONE') {
    process.exitCode = 130;
  }
}

// Run
main().catch((error) => {
  log({
    agent: null,
    step: 'runner_fatal',
    tick: 0,
    details: {
      name: error instanceof Error ? error.name : undefined,
      error: error instanceof Error ? error.message : String(error),
    },
  });
  process.exit(1);
});
