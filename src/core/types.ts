/**
 * Reflex Vacuum - Core Types
 *
 * Type definitions shared by the room, the agent and the run loop.
 */

// ============================================================================
// ROOM TYPES
// ============================================================================

/** 0 = clean, 1 = dirty */
export type DirtFlag = 0 | 1;

/** Room layout as accepted by the Grid: dense array or position-keyed mapping */
export type RoomLayout = readonly DirtFlag[] | Readonly<Record<number, DirtFlag>>;

/** What the agent sees from its position. `null` marks a wall. */
export interface Percept {
  left: DirtFlag | null;
  right: DirtFlag | null;
  centre: DirtFlag;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

// ============================================================================
// ACTION TYPES
// ============================================================================

export type ActionKind = 'move_left' | 'move_right' | 'suck';

export interface Conditions {
  canMoveLeft: boolean;
  canMoveRight: boolean;
  shouldSuck: boolean;
}

export interface Rule {
  /** Action offered when the predicate holds */
  action: ActionKind;
  /** Predicate over the conditions derived from the percept */
  when: (conditions: Conditions) => boolean;
  /** Performance payoff */
  performance: number;
  /** Battery cost */
  cost: number;
}

export interface Candidate {
  action: ActionKind;
  /** performance - cost */
  score: number;
}

// ============================================================================
// AGENT TYPES
// ============================================================================

export type ActionCounts = Record<ActionKind, number>;

export interface AgentConfig {
  /** Agent name, used in log lines */
  name: string;
  /** Starting cell */
  startPosition: number;
}

export interface AgentState {
  /** Current cell */
  position: number;
  /** Cell occupied before the last move */
  previousPosition: number;
  /** Executed actions so far */
  tick: number;
  /** Total battery spent */
  cumulativeCost: number;
  /** Running performance measure */
  cumulativePerformance: number;
  /** Per-action tallies */
  actionCounts: ActionCounts;
}

export interface TickRecord {
  tick: number;
  previousPosition: number;
  position: number;
  percept: Percept;
  candidates: Candidate[];
  avoid: ActionKind | null;
  action: ActionKind;
  /** Room snapshot after the action */
  room: DirtFlag[];
  cost: number;
  performance: number;
}

export type StepOutcome =
  | { status: 'done' }
  | { status: 'acted'; record: TickRecord };

// ============================================================================
// SIMULATION TYPES
// ============================================================================

export type SimulationStatus = 'RUNNING' | 'DONE';

export interface SimulationSummary {
  /** DONE when the room is clean, RUNNING when the loop was stopped early */
  status: SimulationStatus;
  ticks: number;
  totalCost: number;
  totalPerformance: number;
  finalPosition: number;
  actionCounts: ActionCounts;
  room: DirtFlag[];
}

export interface SimulationObserver {
  onTick?(record: TickRecord): void;
  onFinish?(summary: SimulationSummary): void;
}

// ============================================================================
// LOG TYPES
// ============================================================================

export interface LogEntry {
  ts: string;
  agent: string | null;
  step: string;
  tick: number;
  cost?: number;
  details?: Record<string, unknown>;
}
