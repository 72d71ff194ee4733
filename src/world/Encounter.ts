/**
 * Encounter.ts — Combat, trap and puzzle encounters placed in rooms.
 *
 * Each encounter carries a type-specific payload in `details`. Traps and
 * puzzles resolve here with a single 3d6 check; combat resolves through the
 * combat engine and then `complete()` collects the loot.
 */

import { z } from 'zod';
import { BALANCE } from '@/engine/Balance';
import { defaultRandom, type RandomSource } from '@/engine/Random';
import { parseData } from '@/engine/Validation';
import { rollCheck, type CheckResult } from '@/rpg/Dice';
import { Attribute, applyDamage, getModifier } from '@/rpg/StatSystem';
import {
  ItemDataSchema,
  itemFromData,
  itemToData,
  toInventoryItem,
  type Item,
} from '@/rpg/Item';
import { Monster, MonsterDataSchema } from '@/entities/Monster';
import type { Character, StatusEffectRecord } from '@/entities/Character';
import { DUNGEON_TABLES } from '@/world/DungeonTables';

// ---------------------------------------------------------------------------
// Enums & payloads
// ---------------------------------------------------------------------------

export enum EncounterType {
  COMBAT = 1,
  TRAP = 2,
  PUZZLE = 3,
}

export const TRAP_TYPES = ['damage', 'status', 'teleport'] as const;
export type TrapType = (typeof TRAP_TYPES)[number];

export const PUZZLE_TYPES = ['sequence', 'pattern', 'riddle'] as const;
export type PuzzleType = (typeof PUZZLE_TYPES)[number];

interface TrapSave {
  avoidable: boolean;
  saveAttribute: Attribute;
  saveDifficulty: number;
}

export type TrapEffect =
  | ({ type: 'damage'; damage: number } & TrapSave)
  | ({ type: 'status'; status: string; duration: number } & TrapSave)
  | ({ type: 'teleport'; distance: number } & TrapSave);

export interface CombatDetails {
  type: EncounterType.COMBAT;
  monsters: Monster[];
  ambush: boolean;
}

export interface TrapDetails {
  type: EncounterType.TRAP;
  trapType: TrapType;
  detected: boolean;
  disarmed: boolean;
  effect: TrapEffect;
}

export interface PuzzleDetails {
  type: EncounterType.PUZZLE;
  puzzleType: PuzzleType;
  hints: string[];
  solution: string;
  solved: boolean;
  reward: Item | null;
}

export type EncounterDetails = CombatDetails | TrapDetails | PuzzleDetails;

/** Trap effect for a trap type. Status traps draw their condition from `rng`. */
export function generateTrapEffect(
  trapType: TrapType,
  difficulty: number,
  rng: RandomSource,
): TrapEffect {
  const saveDifficulty = 10 + difficulty;
  switch (trapType) {
    case 'damage':
      return {
        type: 'damage',
        damage: 2 + difficulty,
        avoidable: true,
        saveAttribute: Attribute.DEXTERITY,
        saveDifficulty,
      };
    case 'status':
      return {
        type: 'status',
        status: rng.pick(DUNGEON_TABLES.encounters.trapStatuses),
        duration: 1 + Math.floor(difficulty / 2),
        avoidable: true,
        saveAttribute: Attribute.STRENGTH,
        saveDifficulty,
      };
    case 'teleport':
      return {
        type: 'teleport',
        distance: 1 + Math.floor(difficulty / 2),
        avoidable: true,
        saveAttribute: Attribute.WISDOM,
        saveDifficulty,
      };
  }
}

// ---------------------------------------------------------------------------
// Persisted form
// ---------------------------------------------------------------------------

const trapSaveShape = {
  avoidable: z.boolean(),
  save_attribute: z.nativeEnum(Attribute),
  save_difficulty: z.number(),
};

const TrapEffectDataSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('damage'), damage: z.number(), ...trapSaveShape }),
  z.object({ type: z.literal('status'), status: z.string(), duration: z.number(), ...trapSaveShape }),
  z.object({ type: z.literal('teleport'), distance: z.number(), ...trapSaveShape }),
]);

type TrapEffectData = z.infer<typeof TrapEffectDataSchema>;

const encounterBase = {
  difficulty: z.number(),
  completed: z.boolean(),
  description: z.string(),
  rewards: z.array(ItemDataSchema),
};

export const EncounterDataSchema = z.discriminatedUnion('encounter_type', [
  z.object({
    encounter_type: z.literal(EncounterType.COMBAT),
    ...encounterBase,
    monsters: z.array(MonsterDataSchema),
    ambush: z.boolean(),
  }),
  z.object({
    encounter_type: z.literal(EncounterType.TRAP),
    ...encounterBase,
    trap_type: z.enum(TRAP_TYPES),
    detected: z.boolean(),
    disarmed: z.boolean(),
    effect: TrapEffectDataSchema,
  }),
  z.object({
    encounter_type: z.literal(EncounterType.PUZZLE),
    ...encounterBase,
    puzzle_type: z.enum(PUZZLE_TYPES),
    hints: z.array(z.string()),
    solution: z.string(),
    solved: z.boolean(),
    reward: ItemDataSchema.nullable(),
  }),
]);

export type EncounterData = z.infer<typeof EncounterDataSchema>;

function trapEffectToData(effect: TrapEffect): TrapEffectData {
  const save = {
    avoidable: effect.avoidable,
    save_attribute: effect.saveAttribute,
    save_difficulty: effect.saveDifficulty,
  };
  switch (effect.type) {
    case 'damage':
      return { type: 'damage', damage: effect.damage, ...save };
    case 'status':
      return { type: 'status', status: effect.status, duration: effect.duration, ...save };
    case 'teleport':
      return { type: 'teleport', distance: effect.distance, ...save };
  }
}

function trapEffectFromData(data: TrapEffectData): TrapEffect {
  const save = {
    avoidable: data.avoidable,
    saveAttribute: data.save_attribute,
    saveDifficulty: data.save_difficulty,
  };
  switch (data.type) {
    case 'damage':
      return { type: 'damage', damage: data.damage, ...save };
    case 'status':
      return { type: 'status', status: data.status, duration: data.duration, ...save };
    case 'teleport':
      return { type: 'teleport', distance: data.distance, ...save };
  }
}

function createDetails(
  type: EncounterType,
  difficulty: number,
  rng: RandomSource,
): EncounterDetails {
  switch (type) {
    case EncounterType.COMBAT:
      return {
        type,
        monsters: [],
        ambush: rng.chance(BALANCE.encounters.ambushChance),
      };
    case EncounterType.TRAP: {
      const trapType = rng.pick(TRAP_TYPES);
      return {
        type,
        trapType,
        detected: false,
        disarmed: false,
        effect: generateTrapEffect(trapType, difficulty, rng),
      };
    }
    case EncounterType.PUZZLE:
      return {
        type,
        puzzleType: rng.pick(PUZZLE_TYPES),
        hints: [],
        solution: '',
        solved: false,
        reward: null,
      };
  }
}

// ---------------------------------------------------------------------------
// Encounter
// ---------------------------------------------------------------------------

export class Encounter {
  difficulty: number;
  completed = false;
  description = '';
  rewards: Item[] = [];
  details: EncounterDetails;

  /**
   * Combat encounters roll for an ambush; traps pick a trap type (and a
   * status for status traps); puzzles pick a puzzle type.
   */
  constructor(type: EncounterType, difficulty: number = 1, rng: RandomSource = defaultRandom) {
    this.difficulty = difficulty;
    this.details = createDetails(type, difficulty, rng);
  }

  get encounterType(): EncounterType {
    return this.details.type;
  }

  /** Monsters of a combat encounter; empty for other types. */
  get monsters(): Monster[] {
    return this.details.type === EncounterType.COMBAT ? this.details.monsters : [];
  }

  /** Ignored for non-combat encounters. */
  addMonster(monster: Monster): this {
    if (this.details.type === EncounterType.COMBAT) {
      this.details.monsters.push(monster);
    }
    return this;
  }

  addReward(reward: Item): this {
    this.rewards.push({ ...reward });
    return this;
  }

  setDescription(description: string): this {
    this.description = description;
    return this;
  }

  /** Mark completed and collect monster drops plus fixed rewards. */
  complete(rng: RandomSource = defaultRandom): Item[] {
    this.completed = true;
    const collected: Item[] = [];
    for (const monster of this.monsters) {
      for (const drop of monster.getLoot(rng)) {
        collected.push(toInventoryItem(drop));
      }
    }
    for (const reward of this.rewards) {
      collected.push({ ...reward });
    }
    return collected;
  }

  // -----------------------------------------------------------------------
  // Serialization
  // -----------------------------------------------------------------------

  toDict(): EncounterData {
    const base = {
      difficulty: this.difficulty,
      completed: this.completed,
      description: this.description,
      rewards: this.rewards.map(itemToData),
    };
    const d = this.details;
    switch (d.type) {
      case EncounterType.COMBAT:
        return {
          encounter_type: d.type,
          ...base,
          monsters: d.monsters.map((m) => m.toDict()),
          ambush: d.ambush,
        };
      case EncounterType.TRAP:
        return {
          encounter_type: d.type,
          ...base,
          trap_type: d.trapType,
          detected: d.detected,
          disarmed: d.disarmed,
          effect: trapEffectToData(d.effect),
        };
      case EncounterType.PUZZLE:
        return {
          encounter_type: d.type,
          ...base,
          puzzle_type: d.puzzleType,
          hints: [...d.hints],
          solution: d.solution,
          solved: d.solved,
          reward: d.reward ? itemToData(d.reward) : null,
        };
    }
  }

  static fromDict(raw: unknown): Encounter {
    const data = parseData(EncounterDataSchema, raw, 'encounter');
    const encounter = new Encounter(data.encounter_type, data.difficulty);
    encounter.completed = data.completed;
    encounter.description = data.description;
    encounter.rewards = data.rewards.map(itemFromData);
    switch (data.encounter_type) {
      case EncounterType.COMBAT:
        encounter.details = {
          type: EncounterType.COMBAT,
          monsters: data.monsters.map((m) => Monster.fromDict(m)),
          ambush: data.ambush,
        };
        break;
      case EncounterType.TRAP:
        encounter.details = {
          type: EncounterType.TRAP,
          trapType: data.trap_type,
          detected: data.detected,
          disarmed: data.disarmed,
          effect: trapEffectFromData(data.effect),
        };
        break;
      case EncounterType.PUZZLE:
        encounter.details = {
          type: EncounterType.PUZZLE,
          puzzleType: data.puzzle_type,
          hints: [...data.hints],
          solution: data.solution,
          solved: data.solved,
          reward: data.reward ? itemFromData(data.reward) : null,
        };
        break;
    }
    return encounter;
  }
}

// ---------------------------------------------------------------------------
// Trap & puzzle resolution
// ---------------------------------------------------------------------------

export interface TrapOutcome {
  triggered: boolean;
  avoided: boolean;
  check: CheckResult | null;
  message: string;
  damage?: number;
  status?: StatusEffectRecord;
  teleportDistance?: number;
}

export interface PuzzleOutcome {
  success: boolean;
  check: CheckResult | null;
  message: string;
  rewards: Item[];
}

/**
 * Spring a trap on the character. The save uses the trap's attribute
 * against its save difficulty; a failed save applies the effect.
 */
export function resolveTrap(
  encounter: Encounter,
  character: Character,
  rng: RandomSource = defaultRandom,
): TrapOutcome {
  const d = encounter.details;
  if (d.type !== EncounterType.TRAP || encounter.completed) {
    return { triggered: false, avoided: true, check: null, message: 'Nothing happens.' };
  }

  const effect = d.effect;
  const check = rollCheck(getModifier(character.attributes, effect.saveAttribute), effect.saveDifficulty, { rng });
  d.detected = true;
  encounter.completed = true;

  if (check.success && effect.avoidable) {
    return {
      triggered: true,
      avoided: true,
      check,
      message: `You avoid the ${d.trapType} trap!`,
    };
  }

  switch (effect.type) {
    case 'damage': {
      const damage = applyDamage(character, effect.damage);
      return {
        triggered: true,
        avoided: false,
        check,
        message: `A surge of energy hits you for ${damage} damage!`,
        damage,
      };
    }
    case 'status': {
      const status: StatusEffectRecord = {
        type: effect.status,
        duration: effect.duration,
        source: 'trap',
      };
      character.statusEffects.push(status);
      return {
        triggered: true,
        avoided: false,
        check,
        message: `You are afflicted with ${effect.status} for ${effect.duration} turns!`,
        status,
      };
    }
    case 'teleport':
      return {
        triggered: true,
        avoided: false,
        check,
        message: `A spatial distortion hurls you ${effect.distance} rooms away!`,
        teleportDistance: effect.distance,
      };
  }
}

/**
 * Try to disarm a detected trap with a dexterity check at the trap's save
 * difficulty. A failed attempt springs it.
 */
export function disarmTrap(
  encounter: Encounter,
  character: Character,
  rng: RandomSource = defaultRandom,
): TrapOutcome {
  const d = encounter.details;
  if (d.type !== EncounterType.TRAP || encounter.completed) {
    return { triggered: false, avoided: true, check: null, message: 'Nothing happens.' };
  }
  const check = rollCheck(
    getModifier(character.attributes, Attribute.DEXTERITY),
    d.effect.saveDifficulty,
    { rng },
  );
  if (!check.success) {
    return resolveTrap(encounter, character, rng);
  }
  d.detected = true;
  d.disarmed = true;
  encounter.completed = true;
  return { triggered: false, avoided: true, check, message: `You disarm the ${d.trapType} trap.` };
}

/** Wisdom check against 10 + difficulty; success hands out the rewards. */
export function attemptPuzzle(
  encounter: Encounter,
  character: Character,
  rng: RandomSource = defaultRandom,
): PuzzleOutcome {
  const d = encounter.details;
  if (d.type !== EncounterType.PUZZLE || d.solved) {
    return { success: false, check: null, message: 'There is nothing to solve here.', rewards: [] };
  }

  const check = rollCheck(
    getModifier(character.attributes, Attribute.WISDOM),
    10 + encounter.difficulty,
    { rng },
  );
  if (!check.success) {
    const hint = d.hints.length > 0 ? ` Hint: ${d.hints[0]}` : '';
    return { success: false, check, message: `The mechanism resists your attempt.${hint}`, rewards: [] };
  }

  d.solved = true;
  return { success: true, check, message: 'The puzzle clicks into place!', rewards: encounter.complete(rng) };
}
