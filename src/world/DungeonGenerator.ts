// ============================================================================
// DungeonGenerator.ts — Procedural grid dungeon generator
// Links rooms, places entrance and exit, populates rooms with encounters,
// treasure and features, then writes themed descriptions. Deterministic for
// a given seed (or RandomSource) and options.
// ============================================================================

import { BALANCE } from '@/engine/Balance';
import { createLogger } from '@/engine/Logger';
import { createRandom, type RandomSource } from '@/engine/Random';
import { capitalize, joinWithAnd } from '@/engine/Text';
import { COMPONENT_TYPES } from '@/rpg/Item';
import { Monster, MonsterType } from '@/entities/Monster';
import {
  DUNGEON_TABLES,
  fillTemplate,
  getRoomDescription,
  getRoomTemplate,
  getThemeAdjectives,
} from '@/world/DungeonTables';
import { DungeonLevel } from '@/world/DungeonLevel';
import { Encounter, EncounterType } from '@/world/Encounter';
import { generateEncounter } from '@/world/EncounterGenerator';
import {
  DIRECTIONS,
  DIRECTION_NAMES,
  Direction,
  RoomType,
  type Room,
} from '@/world/Room';

const log = createLogger('DungeonGenerator');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export type DungeonAlgorithm = keyof typeof BALANCE.dungeon.linkProbability;

export interface DungeonOptions {
  rows?: number;
  cols?: number;
  /** "bsp" | "maze" | "cellular"; anything else falls back to "bsp". */
  algorithm?: string;
  levelNum?: number;
  theme?: string;
  difficulty?: number;
  /** Ignored when `rng` is given. */
  seed?: number;
  rng?: RandomSource;
  /** Turn one room into a boss chamber. */
  boss?: boolean;
  /** Link rooms the entrance cannot reach. Default true. */
  repairConnectivity?: boolean;
}

const DEFAULT_ALGORITHM: DungeonAlgorithm = 'bsp';

function isAlgorithm(value: string): value is DungeonAlgorithm {
  return Object.hasOwn(BALANCE.dungeon.linkProbability, value);
}

// ---------------------------------------------------------------------------
// DungeonGenerator
// ---------------------------------------------------------------------------

export class DungeonGenerator {
  generate(options: DungeonOptions = {}): DungeonLevel {
    const {
      rows = 10,
      cols = 10,
      levelNum = 1,
      theme = 'neon',
      difficulty = 1,
      boss = false,
      repairConnectivity = true,
    } = options;

    if (!Number.isInteger(rows) || rows < 2) {
      throw new RangeError(`Dungeon needs at least 2 rows (got ${rows})`);
    }
    if (!Number.isInteger(cols) || cols < 1) {
      throw new RangeError(`Dungeon needs at least 1 column (got ${cols})`);
    }

    const rng = options.rng ?? createRandom(options.seed);
    const algorithm = this.resolveAlgorithm(options.algorithm);
    const dungeon = new DungeonLevel(rows, cols, levelNum, theme);

    // 1. Random east/south links
    this.linkGrid(rng, dungeon, algorithm);

    // 2. Entrance on the bottom row, exit on the top row
    this.placeEntranceExit(dungeon);

    // 3. Make every room reachable from the entrance
    if (repairConnectivity) {
      const added = this.repairConnectivity(dungeon);
      if (added > 0) log.debug(`Added ${added} links to reach isolated rooms`);
    }

    // 4. Room types and content
    this.populate(rng, dungeon, theme, difficulty, boss);

    // 5. Descriptions for everything still blank
    this.describe(rng, dungeon, theme);

    log.info(`Generated ${dungeon.name} (${rows}x${cols}, ${algorithm})`);
    return dungeon;
  }

  // =========================================================================
  // Topology
  // =========================================================================

  private resolveAlgorithm(requested: string | undefined): DungeonAlgorithm {
    if (requested === undefined) return DEFAULT_ALGORITHM;
    if (isAlgorithm(requested)) return requested;
    log.warn(`Unknown algorithm "${requested}", using ${DEFAULT_ALGORITHM}`);
    return DEFAULT_ALGORITHM;
  }

  private linkGrid(rng: RandomSource, dungeon: DungeonLevel, algorithm: DungeonAlgorithm): void {
    const p = BALANCE.dungeon.linkProbability[algorithm];
    for (let r = 0; r < dungeon.rows; r++) {
      for (let c = 0; c < dungeon.cols; c++) {
        const room = dungeon.at(r, c);
        if (c < dungeon.cols - 1 && rng.next() < p) {
          dungeon.linkRooms(room, Direction.EAST);
        }
        if (r < dungeon.rows - 1 && rng.next() < p) {
          dungeon.linkRooms(room, Direction.SOUTH);
        }
      }
    }
  }

  private placeEntranceExit(dungeon: DungeonLevel): void {
    const center = Math.floor(dungeon.cols / 2);

    const entrance = dungeon.at(dungeon.rows - 1, center);
    if (entrance.links === 0) dungeon.linkRooms(entrance, Direction.NORTH);
    dungeon.setEntrance(entrance.row, entrance.col);

    const exit = dungeon.at(0, center);
    if (exit.links === 0) dungeon.linkRooms(exit, Direction.SOUTH);
    dungeon.setExit(exit.row, exit.col);
  }

  /**
   * Link each room the entrance cannot reach to the first reachable
   * neighbour, scanning rooms row-major and directions N, S, E, W.
   * Draws no randomness. Returns the number of links added.
   */
  private repairConnectivity(dungeon: DungeonLevel): number {
    const { entrance } = dungeon;
    if (!entrance) return 0;

    let added = 0;
    let reachable = dungeon.reachableFrom(entrance);
    const total = dungeon.rows * dungeon.cols;

    while (reachable.size < total) {
      const bridge = this.findBridge(dungeon, reachable);
      if (!bridge) break;
      dungeon.linkRooms(bridge.room, bridge.direction);
      added++;
      reachable = dungeon.reachableFrom(entrance);
    }
    return added;
  }

  private findBridge(
    dungeon: DungeonLevel,
    reachable: ReadonlySet<Room>,
  ): { room: Room; direction: Direction } | null {
    for (const room of dungeon.allRooms()) {
      if (reachable.has(room)) continue;
      for (const direction of DIRECTIONS) {
        const neighbour = dungeon.getAdjacentRoom(room, direction);
        if (neighbour && reachable.has(neighbour)) return { room, direction };
      }
    }
    return null;
  }

  // =========================================================================
  // Population
  // =========================================================================

  private populate(
    rng: RandomSource,
    dungeon: DungeonLevel,
    theme: string,
    difficulty: number,
    withBoss: boolean,
  ): void {
    const available = rng.shuffle(
      dungeon.allRooms().filter((room) => room !== dungeon.entrance && room !== dungeon.exit),
    );
    const n = dungeon.rows * dungeon.cols - 2;
    const split = BALANCE.dungeon.population;
    let index = 0;

    const take = (fraction: number): Room[] => {
      const count = Math.min(Math.floor(n * fraction), available.length - index);
      const rooms = available.slice(index, index + count);
      index += count;
      return rooms;
    };

    const roomDifficulty = (room: Room): number =>
      difficulty + (dungeon.rows - room.row) / dungeon.rows;

    if (withBoss && available.length > 0) {
      const room = available[index++];
      room.setRoomType(RoomType.BOSS);
      room.difficulty = roomDifficulty(room);
      const encounter = generateEncounter(RoomType.BOSS, room.difficulty, theme, rng);
      if (encounter) room.addEncounter(encounter);
    }

    for (const room of take(split.combat)) {
      room.setRoomType(RoomType.COMBAT);
      room.difficulty = roomDifficulty(room);
      room.addEncounter(this.guardEncounter(rng, room.difficulty));
    }

    for (const room of take(split.treasure)) {
      room.setRoomType(RoomType.TREASURE);
      room.difficulty = roomDifficulty(room);
      const level = Math.floor(room.difficulty);
      const componentType = rng.pick(COMPONENT_TYPES);
      room.addTreasure({
        name: `${capitalize(theme)} ${capitalize(componentType)}`,
        type: 'component',
        componentType,
        value: 5 + level * 2,
        found: false,
      });
      const trap = generateEncounter(RoomType.TREASURE, room.difficulty, theme, rng);
      if (trap) room.addEncounter(trap);
    }

    const { puzzle, rest, artifact } = DUNGEON_TABLES.features;

    for (const room of take(split.puzzle)) {
      room.setRoomType(RoomType.PUZZLE);
      room.difficulty = roomDifficulty(room);
      const level = Math.floor(room.difficulty);
      room.addFeature({
        type: 'puzzle',
        name: puzzle.name,
        description: puzzle.description,
        difficulty: level,
        solved: false,
      });
      room.addTreasure({
        name: artifact.name,
        type: 'item',
        description: artifact.description,
        value: 10 + level * 3,
        found: false,
        requiresPuzzle: true,
      });
    }

    for (const room of take(split.rest)) {
      room.setRoomType(RoomType.REST);
      room.difficulty = roomDifficulty(room);
      room.addFeature({
        type: 'rest',
        name: rest.name,
        description: rest.description,
        healAmount: 1 + difficulty,
      });
    }
  }

  /** Single-construct combat encounter scaled to the room. */
  private guardEncounter(rng: RandomSource, roomDifficulty: number): Encounter {
    const level = Math.floor(roomDifficulty);
    const encounter = new Encounter(EncounterType.COMBAT, level, rng);
    const guard = new Monster(
      `Level ${level} Digital Construct`,
      Math.max(1, level),
      { monsterType: MonsterType.DIGITAL },
      rng,
    );
    encounter.addMonster(guard);
    return encounter.setDescription(`A ${guard.name} guards this area.`);
  }

  // =========================================================================
  // Descriptions
  // =========================================================================

  private describe(rng: RandomSource, dungeon: DungeonLevel, theme: string): void {
    const adjectives = getThemeAdjectives(theme);
    const { corridor, deadEnd } = DUNGEON_TABLES.rooms;

    for (const room of dungeon.allRooms()) {
      if (room.description) continue;

      const type = room.roomType;
      const template = type === null ? undefined : getRoomTemplate(type);
      const fixed = type === null ? undefined : getRoomDescription(type);
      if (!template && fixed) {
        room.description = fixed;
        continue;
      }

      const adj = rng.pick(adjectives);
      if (template) {
        room.description = fillTemplate(template, { adj });
        continue;
      }

      const exits = room.linkDirections.map((dir) => DIRECTION_NAMES[dir]);
      room.description =
        exits.length > 0
          ? fillTemplate(corridor, { adj, exits: joinWithAnd(exits) })
          : fillTemplate(deadEnd, { adj });
    }
  }
}

/** Generate a dungeon level with a fresh generator. */
export function generateDungeon(options: DungeonOptions = {}): DungeonLevel {
  return new DungeonGenerator().generate(options);
}
