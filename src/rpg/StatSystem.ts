/**
 * StatSystem.ts — Attributes, modifiers and derived stat formulas.
 *
 * Three attributes drive everything: strength (HP, melee), dexterity
 * (initiative, defense) and wisdom (MP, perception, puzzles).
 */

import { z } from 'zod';
import { attributeModifier, rollAttributeScore } from '@/rpg/Dice';
import { defaultRandom, type RandomSource } from '@/engine/Random';

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export enum Attribute {
  STRENGTH = 'strength',
  DEXTERITY = 'dexterity',
  WISDOM = 'wisdom',
}

export const ATTRIBUTES: readonly Attribute[] = [
  Attribute.STRENGTH,
  Attribute.DEXTERITY,
  Attribute.WISDOM,
];

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface AttributeBlock {
  [Attribute.STRENGTH]: number;
  [Attribute.DEXTERITY]: number;
  [Attribute.WISDOM]: number;
}

/** Anything with a health pool. */
export interface Vitals {
  hp: number;
  maxHp: number;
}

export const AttributeBlockSchema = z.object({
  strength: z.number().int(),
  dexterity: z.number().int(),
  wisdom: z.number().int(),
});

// ---------------------------------------------------------------------------
// Rolling
// ---------------------------------------------------------------------------

/** 4d6-drop-lowest for each attribute, in strength/dexterity/wisdom order. */
export function rollAttributes(rng: RandomSource = defaultRandom): AttributeBlock {
  return {
    strength: rollAttributeScore(rng),
    dexterity: rollAttributeScore(rng),
    wisdom: rollAttributeScore(rng),
  };
}

export function getModifier(attributes: AttributeBlock, attribute: Attribute): number {
  return attributeModifier(attributes[attribute]);
}

// ---------------------------------------------------------------------------
// Derived stats
// ---------------------------------------------------------------------------

export function characterMaxHp(attributes: AttributeBlock): number {
  return 10 + Math.floor(attributes.strength / 2);
}

export function characterMaxMp(attributes: AttributeBlock): number {
  return 10 + Math.floor(attributes.wisdom / 2);
}

export function characterDefense(attributes: AttributeBlock): number {
  return 10 + Math.floor(attributes.dexterity / 4);
}

export function monsterMaxHp(level: number, attributes: AttributeBlock): number {
  return 5 + level * 3 + Math.floor(attributes.strength / 2);
}

export function monsterAttack(level: number, attributes: AttributeBlock): number {
  return level + Math.floor(attributes.strength / 2);
}

export function monsterDefense(attributes: AttributeBlock): number {
  return 10 + Math.floor(attributes.dexterity / 2);
}

// ---------------------------------------------------------------------------
// Health helpers
// ---------------------------------------------------------------------------

/** Subtract HP, clamping at 0. Returns the HP actually lost. */
export function applyDamage(target: Vitals, amount: number): number {
  const before = target.hp;
  target.hp = Math.max(0, target.hp - Math.max(0, amount));
  return before - target.hp;
}

/** Add HP, clamping at max. Returns the HP actually restored. */
export function applyHealing(target: Vitals, amount: number): number {
  const before = target.hp;
  target.hp = Math.min(target.maxHp, target.hp + Math.max(0, amount));
  return target.hp - before;
}
