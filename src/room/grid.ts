/**
 * Grid
 *
 * A 1 x N row of cells, each clean (0) or dirty (1). The size is fixed at
 * construction. Only `clean` mutates it, and it never re-dirties a cell.
 */

import type { DirtFlag, Percept, RoomLayout } from '../core/types.js';
import { InvalidRoomError, OutOfRangeError } from '../core/errors.js';
import { normalizeRoom } from './layout.js';

export class Grid {
  private readonly cells: DirtFlag[];

  constructor(layout: RoomLayout) {
    const { room, validation } = normalizeRoom(layout);
    if (!room) {
      throw new InvalidRoomError(validation.errors);
    }
    this.cells = room;
  }

  get size(): number {
    return this.cells.length;
  }

  /**
   * Sensors: the cell under the agent plus its two neighbours, `null` past a wall
   */
  sense(position: number): Percept {
    this.assertInRange(position);
    return {
      left: position - 1 >= 0 ? this.cellAt(position - 1) : null,
      right: position + 1 < this.cells.length ? this.cellAt(position + 1) : null,
      centre: this.cellAt(position),
    };
  }

  clean(position: number): void {
    this.assertInRange(position);
    this.cells[position] = 0;
  }

  isFullyClean(): boolean {
    return this.cells.every((cell) => cell === 0);
  }

  dirtyCount(): number {
    return this.cells.filter((cell) => cell === 1).length;
  }

  snapshot(): DirtFlag[] {
    return [...this.cells];
  }

  toString(): string {
    return this.cells.join('');
  }

  private cellAt(position: number): DirtFlag {
    const cell = this.cells[position];
    if (cell === undefined) {
      throw new OutOfRangeError(position, this.cells.length);
    }
    return cell;
  }

  private assertInRange(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position >= this.cells.length) {
      throw new OutOfRangeError(position, this.cells.length);
    }
  }
}
