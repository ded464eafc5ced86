/**
 * Vacuum Cleaner Agent
 *
 * Behavior:
 * - Senses its own cell and the two neighbours
 * - Offers every action whose rule holds, scored performance - cost
 * - Won't step straight back to the cell it just left while another option ties
 * - Every action costs one unit of battery
 */

import type {
  ActionCounts,
  ActionKind,
  AgentConfig,
  AgentState,
  Rule,
  StepOutcome,
} from '../core/types.js';
import { NoLegalActionError, OutOfRangeError } from '../core/errors.js';
import { logCandidates, logPercept } from '../core/logger.js';
import { Grid } from '../room/grid.js';
import { RULES, evaluateRules } from './rules.js';
import { avoidanceTarget, pickAction } from './selection.js';

const DEFAULT_NAME = 'vacuum';

function emptyCounts(): ActionCounts {
  return { move_left: 0, move_right: 0, suck: 0 };
}

/**
 * Apply one action. Moves are not bounds-checked here: the rules only offer
 * a move when the percept shows a cell on that side.
 */
export function execute(action: ActionKind, state: AgentState, grid: Grid): void {
  state.tick++;
  state.cumulativeCost += 1;
  state.cumulativePerformance -= 1;
  state.actionCounts[action]++;

  switch (action) {
    case 'move_left':
      state.previousPosition = state.position;
      state.position -= 1;
      break;
    case 'move_right':
      state.previousPosition = state.position;
      state.position += 1;
      break;
    case 'suck':
      grid.clean(state.position);
      break;
    default: {
      const unknown: never = action;
      throw new Error(`Unknown action: ${String(unknown)}`);
    }
  }
}

export class VacuumCleaner {
  private config: AgentConfig;
  private state: AgentState;
  private grid: Grid;
  private rules: readonly Rule[];

  constructor(config: Partial<AgentConfig>, grid: Grid, rules: readonly Rule[] = RULES) {
    const startPosition = config.startPosition ?? 0;
    if (!Number.isInteger(startPosition) || startPosition < 0 || startPosition >= grid.size) {
      throw new OutOfRangeError(startPosition, grid.size);
    }

    this.config = { name: config.name ?? DEFAULT_NAME, startPosition };
    this.grid = grid;
    this.rules = rules;
    this.state = {
      position: startPosition,
      previousPosition: startPosition,
      tick: 0,
      cumulativeCost: 0,
      cumulativePerformance: 0,
      actionCounts: emptyCounts(),
    };
  }

  get name(): string {
    return this.config.name;
  }

  isDone(): boolean {
    return this.grid.isFullyClean();
  }

  /**
   * One tick: stop if the room is clean, otherwise sense, choose and act.
   */
  step(): StepOutcome {
    if (this.grid.isFullyClean()) {
      return { status: 'done' };
    }

    const { position, previousPosition } = this.state;
    const percept = this.grid.sense(position);
    logPercept(this.config.name, this.state.tick, position, percept);

    const candidates = evaluateRules(percept, this.rules);
    if (candidates.length === 0) {
      throw new NoLegalActionError(position);
    }

    // A lone candidate is taken even if it is the move back
    const avoid = candidates.length > 1 ? avoidanceTarget(previousPosition, position) : null;
    logCandidates(this.config.name, this.state.tick, candidates, avoid);

    const action = pickAction(candidates, avoid);
    execute(action, this.state, this.grid);

    return {
      status: 'acted',
      record: {
        tick: this.state.tick,
        previousPosition: this.state.previousPosition,
        position: this.state.position,
        percept,
        candidates,
        avoid,
        action,
        room: this.grid.snapshot(),
        cost: this.state.cumulativeCost,
        performance: this.state.cumulativePerformance,
      },
    };
  }

  getState(): AgentState {
    return { ...this.state, actionCounts: { ...this.state.actionCounts } };
  }

  getGrid(): Grid {
    return this.grid;
  }
}

export function createVacuumCleaner(
  config: Partial<AgentConfig>,
  grid: Grid,
  rules?: readonly Rule[]
): VacuumCleaner {
  return new VacuumCleaner(config, grid, rules);
}
