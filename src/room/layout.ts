/**
 * Room Layout
 *
 * Validates and normalises room input. A room is either an array of dirt
 * flags or an object keyed by position; positions must run 0..N-1 with no
 * gaps and N >= 1.
 */

import { readFile } from 'node:fs/promises';
import type { DirtFlag, ValidationError, ValidationResult } from '../core/types.js';
import { InvalidRoomError } from '../core/errors.js';

export interface RoomParseResult {
  room?: DirtFlag[];
  validation: ValidationResult;
}

export function isDirtFlag(value: unknown): value is DirtFlag {
  return value === 0 || value === 1;
}

function fail(errors: ValidationError[]): RoomParseResult {
  return { validation: { valid: false, errors } };
}

function fromArray(value: readonly unknown[]): RoomParseResult {
  if (value.length === 0) {
    return fail([{ path: '', message: 'Room must have at least one cell' }]);
  }

  const errors: ValidationError[] = [];
  const room: DirtFlag[] = [];
  value.forEach((cell, i) => {
    if (isDirtFlag(cell)) {
      room.push(cell);
    } else {
      errors.push({ path: `[${i}]`, message: `Must be 0 or 1, got ${JSON.stringify(cell)}` });
    }
  });

  if (errors.length > 0) return fail(errors);
  return { room, validation: { valid: true, errors } };
}

function fromMapping(value: object): RoomParseResult {
  const entries: [string, unknown][] = Object.entries(value);
  if (entries.length === 0) {
    return fail([{ path: '', message: 'Room must have at least one cell' }]);
  }

  const errors: ValidationError[] = [];
  const cells = new Map<number, DirtFlag>();

  for (const [key, cell] of entries) {
    if (!/^(0|[1-9]\d*)$/.test(key)) {
      errors.push({ path: key, message: 'Position must be a non-negative integer' });
      continue;
    }
    if (!isDirtFlag(cell)) {
      errors.push({ path: key, message: `Must be 0 or 1, got ${JSON.stringify(cell)}` });
      continue;
    }
    cells.set(parseInt(key, 10), cell);
  }

  // Keys are unique, so a dense range means every index below the count is present
  const room: DirtFlag[] = [];
  for (let i = 0; i < entries.length; i++) {
    const cell = cells.get(i);
    if (cell === undefined) {
      if (errors.length === 0) {
        errors.push({ path: String(i), message: `Positions must be contiguous from 0; missing ${i}` });
      }
      break;
    }
    room.push(cell);
  }

  if (errors.length > 0) return fail(errors);
  return { room, validation: { valid: true, errors } };
}

/**
 * Validate an arbitrary value and turn it into a dense flag array
 */
export function normalizeRoom(value: unknown): RoomParseResult {
  if (Array.isArray(value)) {
    return fromArray(value);
  }
  if (typeof value === 'object' && value !== null) {
    return fromMapping(value);
  }
  return fail([{ path: '', message: 'Room must be an array or an object keyed by position' }]);
}

export function validateRoom(value: unknown): ValidationResult {
  return normalizeRoom(value).validation;
}

/**
 * Parse a compact room string such as "0010101". Whitespace and commas are
 * ignored.
 */
export function parseRoomString(text: string): RoomParseResult {
  const compact = text.replace(/[\s,]/g, '');
  if (compact.length === 0) {
    return fail([{ path: '', message: 'Room must have at least one cell' }]);
  }

  const errors: ValidationError[] = [];
  const room: DirtFlag[] = [];
  for (let i = 0; i < compact.length; i++) {
    const ch = compact[i];
    if (ch === '0') room.push(0);
    else if (ch === '1') room.push(1);
    else errors.push({ path: `[${i}]`, message: `Must be 0 or 1, got "${ch}"` });
  }

  if (errors.length > 0) return fail(errors);
  return { room, validation: { valid: true, errors } };
}

/**
 * Load and validate a room from a JSON string
 */
export function loadRoom(jsonString: string): RoomParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    return fail([{ path: '', message: `Invalid JSON: ${e instanceof Error ? e.message : String(e)}` }]);
  }
  return normalizeRoom(parsed);
}

export async function readRoomFile(path: string): Promise<DirtFlag[]> {
  const { room, validation } = loadRoom(await readFile(path, 'utf8'));
  if (!room) {
    throw new InvalidRoomError(validation.errors);
  }
  return room;
}
