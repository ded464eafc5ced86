/**
 * Reflex Vacuum - Errors
 *
 * None of these are retried: each one aborts the run.
 */

import type { ValidationError } from './types.js';

export type VacuumErrorCode =
  | 'OUT_OF_RANGE'
  | 'NO_LEGAL_ACTION'
  | 'TICK_LIMIT_EXCEEDED'
  | 'INVALID_ROOM'
  | 'INVALID_CONFIG';

export class VacuumError extends Error {
  readonly code: VacuumErrorCode;

  constructor(code: VacuumErrorCode, message: string) {
    super(message);
    this.name = 'VacuumError';
    this.code = code;
  }
}

export class OutOfRangeError extends VacuumError {
  readonly position: number;
  readonly size: number;

  constructor(position: number, size: number) {
    super('OUT_OF_RANGE', `Position ${position} is outside the room [0, ${size})`);
    this.name = 'OutOfRangeError';
    this.position = position;
    this.size = size;
  }
}

export class NoLegalActionError extends VacuumError {
  readonly position: number | null;

  constructor(position: number | null = null) {
    const where = position === null ? '' : ` at position ${position}`;
    super('NO_LEGAL_ACTION', `No legal action${where} while the room is still dirty`);
    this.name = 'NoLegalActionError';
    this.position = position;
  }
}

export class TickLimitExceededError extends VacuumError {
  readonly maxTicks: number;

  constructor(maxTicks: number) {
    super('TICK_LIMIT_EXCEEDED', `Room not clean after ${maxTicks} ticks`);
    this.name = 'TickLimitExceededError';
    this.maxTicks = maxTicks;
  }
}

export class InvalidRoomError extends VacuumError {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    const summary = errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join('; ');
    super('INVALID_ROOM', `Invalid room: ${summary}`);
    this.name = 'InvalidRoomError';
    this.errors = errors;
  }
}

export class ConfigError extends VacuumError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super('INVALID_CONFIG', `Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}
