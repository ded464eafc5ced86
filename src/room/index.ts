/**
 * Room Module
 *
 * The Grid plus the helpers that build one from a string, a JSON file or a seed.
 */

export { Grid } from './grid.js';

export type { RoomParseResult } from './layout.js';

export {
  isDirtFlag,
  normalizeRoom,
  validateRoom,
  parseRoomString,
  loadRoom,
  readRoomFile,
} from './layout.js';

export { generateRoom } from './generator.js';
