/**
 * Random room generation, reproducible from the RNG seed
 */

import type { DirtFlag } from '../core/types.js';
import { SeededRNG } from '../core/rng.js';
import { InvalidRoomError } from '../core/errors.js';

export function generateRoom(rng: SeededRNG, length: number, dirtProbability: number = 0.5): DirtFlag[] {
  if (!Number.isInteger(length) || length < 1) {
    throw new InvalidRoomError([{ path: 'length', message: 'Must be a positive integer' }]);
  }

  const room: DirtFlag[] = [];
  for (let i = 0; i < length; i++) {
    room.push(rng.nextBool(dirtProbability) ? 1 : 0);
  }
  return room;
}
