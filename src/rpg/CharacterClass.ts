/**
 * CharacterClass.ts — Class definitions: starting kits and skill pools.
 *
 * Loads class data from classes.json. Each class has exactly two starting
 * skills, a two-item starting kit and a pool of advanced skills unlocked
 * while levelling.
 */

import { z } from 'zod';
import classesData from '@/data/classes.json';
import { ItemDataSchema, itemFromData, type Item } from '@/rpg/Item';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export enum CharacterClassId {
  WARRIOR = 'Warrior',
  WIZARD = 'Wizard',
  WHITE_MAGE = 'White Mage',
  WANDERER = 'Wanderer',
}

export interface Skill {
  name: string;
  mpCost: number;
  description: string;
}

export interface CharacterClassDef {
  id: CharacterClassId;
  description: string;
  startingKit: Item[];
  startingSkills: Skill[];
  advancedSkills: Skill[];
}

// ---------------------------------------------------------------------------
// Skill records (persisted form uses mp_cost)
// ---------------------------------------------------------------------------

export const SkillDataSchema = z.object({
  name: z.string(),
  mp_cost: z.number().int().min(0),
  description: z.string(),
});

export type SkillData = z.infer<typeof SkillDataSchema>;

export function skillFromData(data: SkillData): Skill {
  return { name: data.name, mpCost: data.mp_cost, description: data.description };
}

export function skillToData(skill: Skill): SkillData {
  return { name: skill.name, mp_cost: skill.mpCost, description: skill.description };
}

// ---------------------------------------------------------------------------
// Internal data mapping
// ---------------------------------------------------------------------------

const RawClassSchema = z.object({
  id: z.nativeEnum(CharacterClassId),
  description: z.string(),
  startingKit: z.array(ItemDataSchema).length(2),
  startingSkills: z.array(SkillDataSchema).length(2),
  advancedSkills: z.array(SkillDataSchema),
});

type RawClassEntry = z.infer<typeof RawClassSchema>;

function mapRawToClassDef(raw: RawClassEntry): CharacterClassDef {
  return {
    id: raw.id,
    description: raw.description,
    startingKit: raw.startingKit.map(itemFromData),
    startingSkills: raw.startingSkills.map(skillFromData),
    advancedSkills: raw.advancedSkills.map(skillFromData),
  };
}

// ---------------------------------------------------------------------------
// Pre-loaded class map
// ---------------------------------------------------------------------------

const classMap = new Map<CharacterClassId, CharacterClassDef>();

for (const raw of z.array(RawClassSchema).parse(classesData)) {
  classMap.set(raw.id, mapRawToClassDef(raw));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function getClassDef(id: CharacterClassId): CharacterClassDef {
  const def = classMap.get(id);
  if (!def) {
    throw new Error(`[CharacterClass] Missing class definition for "${id}"`);
  }
  return def;
}

export function getAllClasses(): CharacterClassDef[] {
  return Array.from(classMap.values());
}

export function isCharacterClassId(value: string): value is CharacterClassId {
  return Object.values(CharacterClassId).some((id) => id === value);
}

/** Fresh copies of the class's starting kit. */
export function getStartingKit(id: CharacterClassId): Item[] {
  return getClassDef(id).startingKit.map((item) => ({ ...item }));
}

export function getStartingSkills(id: CharacterClassId): Skill[] {
  return getClassDef(id).startingSkills.map((skill) => ({ ...skill }));
}

export function getAdvancedSkills(id: CharacterClassId): Skill[] {
  return getClassDef(id).advancedSkills.map((skill) => ({ ...skill }));
}
