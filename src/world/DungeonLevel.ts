/**
 * DungeonLevel.ts — Grid of rooms making up one dungeon floor.
 *
 * Row 0 is the top (exit side); the entrance sits on the bottom row.
 */

import { z } from 'zod';
import { OutOfBoundsError } from '@/engine/Errors';
import { createLogger } from '@/engine/Logger';
import { parseData } from '@/engine/Validation';
import { DUNGEON_TABLES } from '@/world/DungeonTables';
import {
  DIRECTIONS,
  DIRECTION_NAMES,
  OFFSETS,
  OPPOSITE,
  Room,
  RoomDataSchema,
  RoomType,
  type Direction,
} from '@/world/Room';

const log = createLogger('DungeonLevel');

const PositionSchema = z.tuple([z.number().int(), z.number().int()]);

export const DungeonLevelDataSchema = z.object({
  rows: z.number().int().min(1),
  cols: z.number().int().min(1),
  level_num: z.number().int().min(1),
  theme: z.string(),
  rooms: z.array(RoomDataSchema),
  entrance: PositionSchema.nullable(),
  exit: PositionSchema.nullable(),
  name: z.string(),
  description: z.string(),
});

export type DungeonLevelData = z.infer<typeof DungeonLevelDataSchema>;

export class DungeonLevel {
  readonly rows: number;
  readonly cols: number;
  readonly levelNum: number;
  readonly theme: string;
  entrance: Room | null = null;
  exit: Room | null = null;
  name: string;
  description: string;

  private grid: Room[][];

  constructor(rows: number, cols: number, levelNum: number = 1, theme: string = 'neon') {
    this.rows = rows;
    this.cols = cols;
    this.levelNum = levelNum;
    this.theme = theme;
    this.name = `Level ${levelNum}: ${DUNGEON_TABLES.level.title}`;
    this.description = DUNGEON_TABLES.level.description;

    this.grid = [];
    for (let r = 0; r < rows; r++) {
      const row: Room[] = [];
      for (let c = 0; c < cols; c++) row.push(new Room(r, c));
      this.grid.push(row);
    }
  }

  isValid(row: number, col: number): boolean {
    return row >= 0 && row < this.rows && col >= 0 && col < this.cols;
  }

  /** Room at (row, col). Throws OutOfBoundsError outside the grid. */
  at(row: number, col: number): Room {
    if (!this.isValid(row, col)) {
      throw new OutOfBoundsError(row, col, this.rows, this.cols);
    }
    return this.grid[row][col];
  }

  getAdjacentRoom(room: Room, direction: Direction): Room | null {
    const { dRow, dCol } = OFFSETS[direction];
    const row = room.row + dRow;
    const col = room.col + dCol;
    return this.isValid(row, col) ? this.grid[row][col] : null;
  }

  /**
   * Link `room` to its neighbour in `direction`, setting both sides.
   * Returns false without touching either room when the neighbour would
   * be off the grid.
   */
  linkRooms(room: Room, direction: Direction): boolean {
    const neighbour = this.getAdjacentRoom(room, direction);
    if (!neighbour) return false;
    room.link(direction);
    neighbour.link(OPPOSITE[direction]);
    return true;
  }

  unlinkRooms(room: Room, direction: Direction): boolean {
    const neighbour = this.getAdjacentRoom(room, direction);
    if (!neighbour) return false;
    room.unlink(direction);
    neighbour.unlink(OPPOSITE[direction]);
    return true;
  }

  setEntrance(row: number, col: number): this {
    const room = this.at(row, col);
    room.setRoomType(RoomType.ENTRANCE);
    this.entrance = room;
    return this;
  }

  setExit(row: number, col: number): this {
    const room = this.at(row, col);
    room.setRoomType(RoomType.EXIT);
    this.exit = room;
    return this;
  }

  /** Mark a room discovered, along with every room it links to. */
  discoverRoom(row: number, col: number): Room {
    const room = this.at(row, col);
    room.discovered = true;
    for (const dir of DIRECTIONS) {
      if (!room.linked(dir)) continue;
      const neighbour = this.getAdjacentRoom(room, dir);
      if (neighbour) neighbour.discovered = true;
    }
    return room;
  }

  /** Every room in row-major order. */
  allRooms(): Room[] {
    return this.grid.flat();
  }

  /** Rooms reachable from `start` over links (breadth-first order). */
  reachableFrom(start: Room): Set<Room> {
    const seen = new Set<Room>([start]);
    const queue: Room[] = [start];
    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) break;
      for (const dir of current.linkDirections) {
        const next = this.getAdjacentRoom(current, dir);
        if (next && !seen.has(next)) {
          seen.add(next);
          queue.push(next);
        }
      }
    }
    return seen;
  }

  /**
   * Rebuild every room's link mask through linkRooms so that each link is
   * two-way and stays on the grid. One-sided links gain their far side.
   */
  private relinkRooms(): void {
    const saved = this.allRooms().map((room) => ({ room, directions: room.linkDirections }));
    for (const { room } of saved) room.links = 0;
    for (const { room, directions } of saved) {
      for (const dir of directions) {
        if (!this.linkRooms(room, dir)) {
          log.warn(
            `Dropping ${DIRECTION_NAMES[dir]} link of (${room.row}, ${room.col}): it leaves the ${this.rows}x${this.cols} grid`,
          );
        }
      }
    }
  }

  // -----------------------------------------------------------------------
  // Serialization
  // -----------------------------------------------------------------------

  toDict(): DungeonLevelData {
    return {
      rows: this.rows,
      cols: this.cols,
      level_num: this.levelNum,
      theme: this.theme,
      rooms: this.allRooms().map((room) => room.toDict()),
      entrance: this.entrance ? [this.entrance.row, this.entrance.col] : null,
      exit: this.exit ? [this.exit.row, this.exit.col] : null,
      name: this.name,
      description: this.description,
    };
  }

  static fromDict(raw: unknown): DungeonLevel {
    const data = parseData(DungeonLevelDataSchema, raw, 'dungeon level');
    const dungeon = new DungeonLevel(data.rows, data.cols, data.level_num, data.theme);

    for (const roomData of data.rooms) {
      if (!dungeon.isValid(roomData.row, roomData.col)) {
        log.warn(`Skipping room (${roomData.row}, ${roomData.col}) outside the ${data.rows}x${data.cols} grid`);
        continue;
      }
      dungeon.grid[roomData.row][roomData.col] = Room.fromData(roomData);
    }
    dungeon.relinkRooms();

    if (data.entrance) dungeon.entrance = dungeon.at(data.entrance[0], data.entrance[1]);
    if (data.exit) dungeon.exit = dungeon.at(data.exit[0], data.exit[1]);
    dungeon.name = data.name;
    dungeon.description = data.description;
    return dungeon;
  }
}
