/**
 * Monster.ts — Hostile entities met in dungeon encounters.
 *
 * Attributes scale with level and lean toward the monster's type; the
 * ability list and loot table are sampled once at creation.
 */

import { z } from 'zod';
import monstersData from '@/data/monsters.json';
import { defaultRandom, type RandomSource } from '@/engine/Random';
import { parseData } from '@/engine/Validation';
import {
  AttributeBlockSchema,
  monsterAttack,
  monsterDefense,
  monsterMaxHp,
  type AttributeBlock,
  type Vitals,
} from '@/rpg/StatSystem';
import {
  LootEntryDataSchema,
  lootEntryFromData,
  lootEntryToData,
  type LootEntry,
} from '@/rpg/Item';
import { generateLootTable, rollLoot } from '@/rpg/LootTable';

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export enum MonsterType {
  GLITCH = 1,
  DIGITAL = 2,
  CORRUPTED = 3,
  VIRUS = 4,
}

export const MONSTER_TYPES: readonly MonsterType[] = [
  MonsterType.GLITCH,
  MonsterType.DIGITAL,
  MonsterType.CORRUPTED,
  MonsterType.VIRUS,
];

// ---------------------------------------------------------------------------
// Abilities
// ---------------------------------------------------------------------------

export type AbilityTarget = 'single' | 'all' | 'self';

export interface MonsterAbility {
  name: string;
  damageMultiplier?: number;
  damage?: number;
  effect?: string;
  amount?: number;
  duration?: number;
  target?: AbilityTarget;
  cooldown?: number;
  /** Share of dealt damage the user recovers. */
  healPercent?: number;
}

export const MonsterAbilityDataSchema = z.object({
  name: z.string(),
  damage_multiplier: z.number().optional(),
  damage: z.number().optional(),
  effect: z.string().optional(),
  amount: z.number().optional(),
  duration: z.number().optional(),
  target: z.enum(['single', 'all', 'self']).optional(),
  cooldown: z.number().optional(),
  heal_percent: z.number().optional(),
});

export type MonsterAbilityData = z.infer<typeof MonsterAbilityDataSchema>;

export function abilityFromData(data: MonsterAbilityData): MonsterAbility {
  return {
    name: data.name,
    damageMultiplier: data.damage_multiplier,
    damage: data.damage,
    effect: data.effect,
    amount: data.amount,
    duration: data.duration,
    target: data.target,
    cooldown: data.cooldown,
    healPercent: data.heal_percent,
  };
}

export function abilityToData(ability: MonsterAbility): MonsterAbilityData {
  return {
    name: ability.name,
    damage_multiplier: ability.damageMultiplier,
    damage: ability.damage,
    effect: ability.effect,
    amount: ability.amount,
    duration: ability.duration,
    target: ability.target,
    cooldown: ability.cooldown,
    heal_percent: ability.healPercent,
  };
}

// ---------------------------------------------------------------------------
// Internal: type table from monsters.json
// ---------------------------------------------------------------------------

interface MonsterTypeInfo {
  name: string;
  suffixes: string[];
  abilities: MonsterAbility[];
}

const TypeEntrySchema = z.object({
  name: z.string(),
  suffixes: z.array(z.string()).min(1),
  abilities: z.array(MonsterAbilityDataSchema).min(1),
});

const rawTypes = z.record(z.string(), TypeEntrySchema).parse(monstersData.types);
const typeTable = new Map<MonsterType, MonsterTypeInfo>();

for (const type of MONSTER_TYPES) {
  const raw = rawTypes[String(type)];
  if (!raw) {
    throw new Error(`[Monster] monsters.json has no entry for type ${type}`);
  }
  typeTable.set(type, {
    name: raw.name,
    suffixes: raw.suffixes,
    abilities: raw.abilities.map(abilityFromData),
  });
}

function getTypeInfo(type: MonsterType): MonsterTypeInfo {
  const info = typeTable.get(type);
  if (!info) throw new Error(`[Monster] Unknown monster type ${type}`);
  return info;
}

/** Display name, e.g. "Glitch". */
export function monsterTypeName(type: MonsterType): string {
  return getTypeInfo(type).name;
}

export function getNameSuffixes(type: MonsterType): readonly string[] {
  return getTypeInfo(type).suffixes;
}

/** Fresh copies of the type's ability pool. */
export function getAbilityPool(type: MonsterType): MonsterAbility[] {
  return getTypeInfo(type).abilities.map((a) => ({ ...a }));
}

/** 10 + level everywhere, then the type's lean. */
export function generateAttributes(level: number, type: MonsterType): AttributeBlock {
  const base = 10 + level;
  const attributes: AttributeBlock = { strength: base, dexterity: base, wisdom: base };
  switch (type) {
    case MonsterType.GLITCH:
      attributes.dexterity += 2;
      break;
    case MonsterType.DIGITAL:
      attributes.wisdom += 2;
      break;
    case MonsterType.CORRUPTED:
      attributes.strength += 2;
      break;
    case MonsterType.VIRUS:
      attributes.strength += 1;
      attributes.dexterity += 1;
      break;
  }
  return attributes;
}

// ---------------------------------------------------------------------------
// Persisted form
// ---------------------------------------------------------------------------

export const MonsterDataSchema = z.object({
  name: z.string(),
  level: z.number().int().min(0),
  monster_type: z.nativeEnum(MonsterType),
  attributes: AttributeBlockSchema,
  max_hp: z.number().int(),
  hp: z.number().int().min(0),
  attack: z.number().int(),
  defense: z.number().int(),
  abilities: z.array(MonsterAbilityDataSchema),
  loot: z.array(LootEntryDataSchema),
}).refine((m) => m.hp <= m.max_hp, { message: 'hp exceeds max_hp', path: ['hp'] });

export type MonsterData = z.infer<typeof MonsterDataSchema>;

// ---------------------------------------------------------------------------
// Monster
// ---------------------------------------------------------------------------

export interface MonsterOptions {
  monsterType?: MonsterType;
  attributes?: AttributeBlock;
  abilities?: MonsterAbility[];
  loot?: LootEntry[];
}

export class Monster implements Vitals {
  name: string;
  level: number;
  monsterType: MonsterType;
  attributes: AttributeBlock;
  maxHp: number;
  hp: number;
  attack: number;
  defense: number;
  abilities: MonsterAbility[];
  loot: LootEntry[];

  /**
   * Anything not supplied in `options` is generated, drawing from `rng` in
   * this order: type, ability sample, loot table.
   */
  constructor(
    name: string,
    level: number,
    options: MonsterOptions = {},
    rng: RandomSource = defaultRandom,
  ) {
    this.name = name;
    this.level = level;
    this.monsterType = options.monsterType ?? rng.pick(MONSTER_TYPES);
    this.attributes = options.attributes
      ? { ...options.attributes }
      : generateAttributes(level, this.monsterType);

    this.maxHp = monsterMaxHp(level, this.attributes);
    this.hp = this.maxHp;
    this.attack = monsterAttack(level, this.attributes);
    this.defense = monsterDefense(this.attributes);

    if (options.abilities) {
      this.abilities = options.abilities.map((a) => ({ ...a }));
    } else {
      const pool = getAbilityPool(this.monsterType);
      const count = Math.min(1 + Math.floor(level / 3), pool.length);
      this.abilities = rng.sample(pool, count);
    }

    this.loot = options.loot
      ? options.loot.map((entry) => ({ ...entry }))
      : generateLootTable(level, monsterTypeName(this.monsterType), rng);
  }

  get isAlive(): boolean {
    return this.hp > 0;
  }

  get typeName(): string {
    return monsterTypeName(this.monsterType);
  }

  /** Roll this monster's drops. */
  getLoot(rng: RandomSource = defaultRandom): LootEntry[] {
    return rollLoot(this.loot, rng);
  }

  toDict(): MonsterData {
    return {
      name: this.name,
      level: this.level,
      monster_type: this.monsterType,
      attributes: { ...this.attributes },
      max_hp: this.maxHp,
      hp: this.hp,
      attack: this.attack,
      defense: this.defense,
      abilities: this.abilities.map(abilityToData),
      loot: this.loot.map(lootEntryToData),
    };
  }

  static fromDict(raw: unknown): Monster {
    const data = parseData(MonsterDataSchema, raw, 'monster');
    const monster = new Monster(data.name, data.level, {
      monsterType: data.monster_type,
      attributes: data.attributes,
      abilities: data.abilities.map(abilityFromData),
      loot: data.loot.map(lootEntryFromData),
    });
    monster.maxHp = data.max_hp;
    monster.hp = data.hp;
    monster.attack = data.attack;
    monster.defense = data.defense;
    return monster;
  }
}
