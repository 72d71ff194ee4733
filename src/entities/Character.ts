/**
 * Character.ts — The player character.
 *
 * Owns attributes, derived pools, inventory, equipment, skills and
 * levelling. Combat reads and mutates hp/mp directly; everything else goes
 * through the methods here.
 */

import { z } from 'zod';
import { defaultRandom, type RandomSource } from '@/engine/Random';
import { parseData } from '@/engine/Validation';
import {
  AttributeBlockSchema,
  applyDamage,
  applyHealing,
  characterDefense,
  characterMaxHp,
  characterMaxMp,
  rollAttributes,
  type AttributeBlock,
  type Vitals,
} from '@/rpg/StatSystem';
import {
  CharacterClassId,
  SkillDataSchema,
  getAdvancedSkills,
  getStartingKit,
  getStartingSkills,
  skillFromData,
  skillToData,
  type Skill,
} from '@/rpg/CharacterClass';
import {
  EQUIP_SLOTS,
  EquipSlot,
  ItemDataSchema,
  isEquipSlot,
  itemFromData,
  itemToData,
  type Item,
} from '@/rpg/Item';
import {
  canLevelUp,
  grantsAdvancedSkill,
  pickAdvancedSkill,
  rollLevelGrowth,
  xpThreshold,
  type LevelUpResult,
} from '@/rpg/LevelingSystem';
import { resolveSkillEffect, type SkillArea } from '@/rpg/SkillSystem';
import type { EffectSpec } from '@/combat/StatusEffectSystem';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** Lingering condition outside combat (poison from a trap, etc.). */
export interface StatusEffectRecord {
  type: string;
  duration: number;
  amount?: number;
  source?: string;
}

export type Equipment = Record<EquipSlot, string | null>;

export interface SkillResult {
  success: boolean;
  message: string;
  skill?: Skill;
  damage?: number;
  healing?: number;
  area?: SkillArea;
  /** Self-buff for the combat engine to turn into an active effect. */
  effect?: EffectSpec;
}

// ---------------------------------------------------------------------------
// Persisted form
// ---------------------------------------------------------------------------

const StatusEffectDataSchema = z.object({
  type: z.string(),
  duration: z.number().int(),
  amount: z.number().optional(),
  source: z.string().optional(),
});

export const CharacterDataSchema = z.object({
  name: z.string(),
  class: z.nativeEnum(CharacterClassId),
  origin: z.string(),
  level: z.number().int().min(1),
  xp: z.number().min(0),
  attributes: AttributeBlockSchema,
  max_hp: z.number().int().min(1),
  max_mp: z.number().int().min(0),
  hp: z.number().int().min(0),
  mp: z.number().int().min(0),
  inventory: z.array(ItemDataSchema),
  equipment: z.object({
    weapon: z.string().nullable(),
    armor: z.string().nullable(),
    accessory: z.string().nullable(),
  }),
  skills: z.array(SkillDataSchema),
  status_effects: z.array(StatusEffectDataSchema),
})
  .refine((c) => c.hp <= c.max_hp, { message: 'hp exceeds max_hp', path: ['hp'] })
  .refine((c) => c.mp <= c.max_mp, { message: 'mp exceeds max_mp', path: ['mp'] });

export type CharacterData = z.infer<typeof CharacterDataSchema>;

// ---------------------------------------------------------------------------
// Character
// ---------------------------------------------------------------------------

export class Character implements Vitals {
  name: string;
  characterClass: CharacterClassId;
  origin: string;
  level = 1;
  xp = 0;
  attributes: AttributeBlock;
  maxHp: number;
  maxMp: number;
  hp: number;
  mp: number;
  inventory: Item[];
  equipment: Equipment = { weapon: null, armor: null, accessory: null };
  skills: Skill[];
  statusEffects: StatusEffectRecord[] = [];

  /**
   * Attributes are rolled (4d6 drop lowest) when omitted. The class's
   * starting kit is added to the inventory and equipped.
   */
  constructor(
    name: string,
    characterClass: CharacterClassId,
    origin: string,
    attributes?: AttributeBlock,
    rng: RandomSource = defaultRandom,
  ) {
    this.name = name;
    this.characterClass = characterClass;
    this.origin = origin;
    this.attributes = attributes ? { ...attributes } : rollAttributes(rng);

    this.maxHp = characterMaxHp(this.attributes);
    this.maxMp = characterMaxMp(this.attributes);
    this.hp = this.maxHp;
    this.mp = this.maxMp;

    this.inventory = getStartingKit(characterClass);
    this.skills = getStartingSkills(characterClass);
    for (const item of this.inventory) {
      this.equipItem(item.name);
    }
  }

  // -----------------------------------------------------------------------
  // Derived
  // -----------------------------------------------------------------------

  get defense(): number {
    return characterDefense(this.attributes);
  }

  get isAlive(): boolean {
    return this.hp > 0;
  }

  xpToNextLevel(): number {
    return Math.max(0, xpThreshold(this.level) - this.xp);
  }

  // -----------------------------------------------------------------------
  // Levelling
  // -----------------------------------------------------------------------

  /** Add XP. At most one level is gained per call. */
  gainXp(amount: number, rng: RandomSource = defaultRandom): boolean {
    this.xp = Math.max(0, this.xp + amount);
    if (canLevelUp(this.level, this.xp)) {
      this.levelUp(rng);
      return true;
    }
    return false;
  }

  levelUp(rng: RandomSource = defaultRandom): LevelUpResult {
    this.level += 1;

    const growth = rollLevelGrowth(this.attributes, rng);
    this.maxHp += growth.hpIncrease;
    this.maxMp += growth.mpIncrease;
    this.hp = this.maxHp;
    this.mp = this.maxMp;

    let newSkill: Skill | null = null;
    if (grantsAdvancedSkill(this.level)) {
      newSkill = pickAdvancedSkill(getAdvancedSkills(this.characterClass), this.skills, rng);
      if (newSkill) this.skills.push(newSkill);
    }

    return { newLevel: this.level, ...growth, newSkill };
  }

  // -----------------------------------------------------------------------
  // Skills
  // -----------------------------------------------------------------------

  /**
   * Spend MP and roll the skill's effect. Damage lands on `target` when one
   * is given; healing lands on `target`, or on this character by default.
   */
  useSkill(name: string, target?: Vitals, rng: RandomSource = defaultRandom): SkillResult {
    const skill = this.skills.find((s) => s.name === name);
    if (!skill) {
      return { success: false, message: `Skill ${name} not found` };
    }
    if (this.mp < skill.mpCost) {
      return { success: false, message: 'Not enough MP', skill };
    }

    this.mp -= skill.mpCost;
    const outcome = resolveSkillEffect(skill.name, this.attributes, rng);

    if (!outcome) {
      return { success: true, message: `Used ${skill.name}!`, skill };
    }
    switch (outcome.kind) {
      case 'damage':
        if (target) applyDamage(target, outcome.amount);
        return {
          success: true,
          message: `${skill.name} deals ${outcome.amount} damage!`,
          skill,
          damage: outcome.amount,
          area: outcome.area,
        };
      case 'healing':
        applyHealing(target ?? this, outcome.amount);
        return {
          success: true,
          message: `${skill.name} restores ${outcome.amount} HP!`,
          skill,
          healing: outcome.amount,
          area: outcome.area,
        };
      case 'buff':
        return {
          success: true,
          message: `Used ${skill.name}!`,
          skill,
          area: outcome.area,
          effect: outcome.effect,
        };
    }
  }

  // -----------------------------------------------------------------------
  // Inventory & equipment
  // -----------------------------------------------------------------------

  addItem(item: Item): void {
    this.inventory.push({ ...item });
  }

  /** Remove and return the item at `index`, or null when out of range. */
  removeItemAt(index: number): Item | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.inventory.length) return null;
    const [removed] = this.inventory.splice(index, 1);
    return removed;
  }

  findItem(name: string): Item | undefined {
    return this.inventory.find((item) => item.name === name);
  }

  /** Equip by name. The item stays in the inventory. */
  equipItem(name: string): boolean {
    const item = this.findItem(name);
    if (!item || !isEquipSlot(item.type)) return false;
    this.equipment[item.type] = item.name;
    return true;
  }

  unequip(slot: EquipSlot): string | null {
    const previous = this.equipment[slot];
    this.equipment[slot] = null;
    return previous;
  }

  /** Inventory records for the currently equipped items. */
  equippedItems(): Item[] {
    const items: Item[] = [];
    for (const slot of EQUIP_SLOTS) {
      const name = this.equipment[slot];
      const item = name === null ? undefined : this.findItem(name);
      if (item) items.push(item);
    }
    return items;
  }

  restoreMp(amount: number): number {
    const before = this.mp;
    this.mp = Math.min(this.maxMp, this.mp + Math.max(0, amount));
    return this.mp - before;
  }

  // -----------------------------------------------------------------------
  // Serialization
  // -----------------------------------------------------------------------

  toDict(): CharacterData {
    return {
      name: this.name,
      class: this.characterClass,
      origin: this.origin,
      level: this.level,
      xp: this.xp,
      attributes: { ...this.attributes },
      max_hp: this.maxHp,
      max_mp: this.maxMp,
      hp: this.hp,
      mp: this.mp,
      inventory: this.inventory.map(itemToData),
      equipment: { ...this.equipment },
      skills: this.skills.map(skillToData),
      status_effects: this.statusEffects.map((e) => ({ ...e })),
    };
  }

  static fromDict(raw: unknown): Character {
    const data = parseData(CharacterDataSchema, raw, 'character');
    const character = new Character(data.name, data.class, data.origin, data.attributes);
    character.level = data.level;
    character.xp = data.xp;
    character.maxHp = data.max_hp;
    character.maxMp = data.max_mp;
    character.hp = data.hp;
    character.mp = data.mp;
    character.inventory = data.inventory.map(itemFromData);
    character.equipment = { ...data.equipment };
    character.skills = data.skills.map(skillFromData);
    character.statusEffects = data.status_effects.map((e) => ({ ...e }));
    return character;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createCharacter(
  name: string,
  characterClass: CharacterClassId,
  origin: string,
  attributes?: AttributeBlock,
  rng: RandomSource = defaultRandom,
): Character {
  return new Character(name, characterClass, origin, attributes, rng);
}
