/**
 * Room.ts — A single grid cell of a dungeon level.
 *
 * Links are a bitmask of directions. Only DungeonLevel.linkRooms should
 * call link()/unlink(), since it keeps both sides of a link in step.
 */

import { z } from 'zod';
import { BALANCE } from '@/engine/Balance';
import { defaultRandom, type RandomSource } from '@/engine/Random';
import { parseData } from '@/engine/Validation';
import { rollCheck, rollDie } from '@/rpg/Dice';
import { Attribute, applyHealing, getModifier } from '@/rpg/StatSystem';
import {
  TreasureDataSchema,
  treasureFromData,
  treasureToData,
  type Treasure,
} from '@/rpg/Item';
import type { Character } from '@/entities/Character';
import {
  Encounter,
  EncounterDataSchema,
  EncounterType,
  resolveTrap,
  type TrapOutcome,
} from '@/world/Encounter';
import { getRoomTypeName } from '@/world/DungeonTables';

// ---------------------------------------------------------------------------
// Directions
// ---------------------------------------------------------------------------

export enum Direction {
  NORTH = 1,
  SOUTH = 2,
  EAST = 4,
  WEST = 8,
}

/** Scan order used wherever directions are enumerated. */
export const DIRECTIONS: readonly Direction[] = [
  Direction.NORTH,
  Direction.SOUTH,
  Direction.EAST,
  Direction.WEST,
];

export const OPPOSITE: Record<Direction, Direction> = {
  [Direction.NORTH]: Direction.SOUTH,
  [Direction.SOUTH]: Direction.NORTH,
  [Direction.EAST]: Direction.WEST,
  [Direction.WEST]: Direction.EAST,
};

export const OFFSETS: Record<Direction, { dRow: number; dCol: number }> = {
  [Direction.NORTH]: { dRow: -1, dCol: 0 },
  [Direction.SOUTH]: { dRow: 1, dCol: 0 },
  [Direction.EAST]: { dRow: 0, dCol: 1 },
  [Direction.WEST]: { dRow: 0, dCol: -1 },
};

export const DIRECTION_NAMES: Record<Direction, string> = {
  [Direction.NORTH]: 'north',
  [Direction.SOUTH]: 'south',
  [Direction.EAST]: 'east',
  [Direction.WEST]: 'west',
};

/** "north" / "N" / "North" -> Direction.NORTH. */
export function parseDirection(input: string): Direction | null {
  const key = input.trim().toLowerCase();
  for (const dir of DIRECTIONS) {
    const name = DIRECTION_NAMES[dir];
    if (key === name || key === name.charAt(0)) return dir;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Room types & features
// ---------------------------------------------------------------------------

export enum RoomType {
  ENTRANCE = 0,
  EXIT = 1,
  COMBAT = 2,
  TREASURE = 3,
  PUZZLE = 4,
  REST = 5,
  BOSS = 6,
}

export interface PuzzleFeature {
  type: 'puzzle';
  name: string;
  description: string;
  difficulty: number;
  solved: boolean;
}

export interface RestFeature {
  type: 'rest';
  name: string;
  description: string;
  healAmount: number;
}

export type RoomFeature = PuzzleFeature | RestFeature;

export interface RoomEntryResult {
  events: string[];
  encountersTriggered: boolean;
  treasuresFound: Treasure[];
  /** Set when a trap guarding the room went off. */
  trap?: TrapOutcome;
}

export interface PuzzleSolveResult {
  success: boolean;
  message: string;
  treasures: Treasure[];
}

// ---------------------------------------------------------------------------
// Persisted form
// ---------------------------------------------------------------------------

const RoomFeatureDataSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('puzzle'),
    name: z.string(),
    description: z.string(),
    difficulty: z.number(),
    solved: z.boolean(),
  }),
  z.object({
    type: z.literal('rest'),
    name: z.string(),
    description: z.string(),
    heal_amount: z.number(),
  }),
]);

type RoomFeatureData = z.infer<typeof RoomFeatureDataSchema>;

export const RoomDataSchema = z.object({
  row: z.number().int().min(0),
  col: z.number().int().min(0),
  links: z.number().int().min(0).max(15),
  room_type: z.nativeEnum(RoomType).nullable(),
  discovered: z.boolean(),
  visited: z.boolean(),
  encounters: z.array(EncounterDataSchema),
  treasures: z.array(TreasureDataSchema),
  features: z.array(RoomFeatureDataSchema),
  description: z.string(),
  difficulty: z.number(),
});

export type RoomData = z.infer<typeof RoomDataSchema>;

function featureToData(feature: RoomFeature): RoomFeatureData {
  if (feature.type === 'puzzle') return { ...feature };
  return {
    type: 'rest',
    name: feature.name,
    description: feature.description,
    heal_amount: feature.healAmount,
  };
}

function featureFromData(data: RoomFeatureData): RoomFeature {
  if (data.type === 'puzzle') return { ...data };
  return {
    type: 'rest',
    name: data.name,
    description: data.description,
    healAmount: data.heal_amount,
  };
}

// ---------------------------------------------------------------------------
// Room
// ---------------------------------------------------------------------------

export class Room {
  readonly row: number;
  readonly col: number;
  links = 0;
  roomType: RoomType | null = null;
  discovered = false;
  visited = false;
  encounters: Encounter[] = [];
  treasures: Treasure[] = [];
  features: RoomFeature[] = [];
  description = '';
  difficulty = 1;

  constructor(row: number, col: number) {
    this.row = row;
    this.col = col;
  }

  // -----------------------------------------------------------------------
  // Links
  // -----------------------------------------------------------------------

  linked(direction: Direction): boolean {
    return (this.links & direction) !== 0;
  }

  link(direction: Direction): void {
    this.links |= direction;
  }

  unlink(direction: Direction): void {
    this.links &= ~direction;
  }

  /** Open directions in N, S, E, W order. */
  get linkDirections(): Direction[] {
    return DIRECTIONS.filter((dir) => this.linked(dir));
  }

  // -----------------------------------------------------------------------
  // Content
  // -----------------------------------------------------------------------

  setRoomType(roomType: RoomType | null): void {
    this.roomType = roomType;
  }

  /** "Combat Chamber", "Entrance", ... or "Unknown Room" for corridors. */
  get name(): string {
    return getRoomTypeName(this.roomType);
  }

  addEncounter(encounter: Encounter): void {
    this.encounters.push(encounter);
  }

  addTreasure(treasure: Treasure): void {
    this.treasures.push(treasure);
  }

  addFeature(feature: RoomFeature): void {
    this.features.push(feature);
  }

  isCleared(): boolean {
    return this.encounters.every((e) => e.completed);
  }

  /** Incomplete combat encounters, in placement order. */
  pendingCombat(): Encounter[] {
    return this.encounters.filter(
      (e) => e.encounterType === EncounterType.COMBAT && !e.completed,
    );
  }

  // -----------------------------------------------------------------------
  // Entering
  // -----------------------------------------------------------------------

  /**
   * Immediate effects of walking in: combat rooms report pending
   * encounters, treasure rooms spring their trap and then roll perception,
   * rest rooms heal 1d6 on every visit.
   */
  enterRoom(character: Character, rng: RandomSource = defaultRandom): RoomEntryResult {
    this.visited = true;
    const result: RoomEntryResult = {
      events: [`You enter ${this.name}.`],
      encountersTriggered: false,
      treasuresFound: [],
    };

    if (
      (this.roomType === RoomType.COMBAT || this.roomType === RoomType.BOSS) &&
      this.encounters.length > 0 &&
      !this.isCleared()
    ) {
      result.encountersTriggered = true;
      result.events.push('Hostile entities detected!');
    }

    if (this.roomType === RoomType.TREASURE) {
      const trap = this.encounters.find(
        (e) => e.encounterType === EncounterType.TRAP && !e.completed,
      );
      if (trap) {
        result.trap = resolveTrap(trap, character, rng);
        result.events.push(result.trap.message);
      }

      if (this.treasures.length > 0) {
        const perception = rollCheck(
          getModifier(character.attributes, Attribute.WISDOM),
          BALANCE.dungeon.perceptionDifficulty,
          { rng },
        );
        if (perception.success) {
          const found = this.treasures.filter((t) => !t.found && !t.requiresPuzzle);
          for (const treasure of found) treasure.found = true;
          if (found.length > 0) {
            result.treasuresFound = found;
            result.events.push(`You found ${found.length} items!`);
          }
        }
      }
    }

    if (this.roomType === RoomType.REST) {
      const heal = rollDie(BALANCE.dungeon.restHealDie, rng);
      const healed = applyHealing(character, heal);
      if (healed > 0) {
        result.events.push(`The room's restorative protocols heal you for ${healed} HP.`);
      }
    }

    return result;
  }

  /**
   * Work the room's puzzle: 3d6 + wisdom modifier against
   * 10 + puzzle difficulty. Success unlocks the puzzle's treasures.
   */
  solvePuzzle(character: Character, rng: RandomSource = defaultRandom): PuzzleSolveResult {
    const puzzle = this.features.find(
      (f): f is PuzzleFeature => f.type === 'puzzle' && !f.solved,
    );
    if (!puzzle) {
      return { success: false, message: 'There is no puzzle here.', treasures: [] };
    }

    const check = rollCheck(
      getModifier(character.attributes, Attribute.WISDOM),
      10 + puzzle.difficulty,
      { rng },
    );
    if (!check.success) {
      return {
        success: false,
        message: `The ${puzzle.name} flickers and resets.`,
        treasures: [],
      };
    }

    puzzle.solved = true;
    const unlocked = this.treasures.filter((t) => t.requiresPuzzle && !t.found);
    for (const treasure of unlocked) treasure.found = true;
    return {
      success: true,
      message: `You solve the ${puzzle.name}!`,
      treasures: unlocked,
    };
  }

  /** HP restored by the room's rest feature, or null when it has none. */
  restAtFeature(character: Character): number | null {
    const feature = this.features.find((f): f is RestFeature => f.type === 'rest');
    return feature ? applyHealing(character, feature.healAmount) : null;
  }

  // -----------------------------------------------------------------------
  // Serialization
  // -----------------------------------------------------------------------

  toDict(): RoomData {
    return {
      row: this.row,
      col: this.col,
      links: this.links,
      room_type: this.roomType,
      discovered: this.discovered,
      visited: this.visited,
      encounters: this.encounters.map((e) => e.toDict()),
      treasures: this.treasures.map(treasureToData),
      features: this.features.map(featureToData),
      description: this.description,
      difficulty: this.difficulty,
    };
  }

  static fromDict(raw: unknown): Room {
    const data = parseData(RoomDataSchema, raw, 'room');
    return Room.fromData(data);
  }

  /** Build from already-validated data. */
  static fromData(data: RoomData): Room {
    const room = new Room(data.row, data.col);
    room.links = data.links;
    room.roomType = data.room_type;
    room.discovered = data.discovered;
    room.visited = data.visited;
    room.encounters = data.encounters.map((e) => Encounter.fromDict(e));
    room.treasures = data.treasures.map(treasureFromData);
    room.features = data.features.map(featureFromData);
    room.description = data.description;
    room.difficulty = data.difficulty;
    return room;
  }
}
