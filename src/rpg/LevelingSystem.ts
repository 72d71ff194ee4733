/**
 * LevelingSystem.ts — XP thresholds and level-up growth.
 *
 * Flat curve: reaching `level * xpPerLevel` total XP grants the next level.
 * Growth rolls use the character's attributes; every few levels a random
 * advanced class skill is learned.
 */

import { BALANCE } from '@/engine/Balance';
import { rollDie } from '@/rpg/Dice';
import type { AttributeBlock } from '@/rpg/StatSystem';
import type { Skill } from '@/rpg/CharacterClass';
import type { RandomSource } from '@/engine/Random';

// ---------------------------------------------------------------------------
// Constants from balance data
// ---------------------------------------------------------------------------

const XP_PER_LEVEL = BALANCE.leveling.xpPerLevel; // 1000
const ADVANCED_SKILL_EVERY = BALANCE.leveling.advancedSkillEvery; // 3

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface LevelGrowth {
  hpIncrease: number;
  mpIncrease: number;
}

export interface LevelUpResult extends LevelGrowth {
  newLevel: number;
  newSkill: Skill | null;
}

// ---------------------------------------------------------------------------
// XP helpers
// ---------------------------------------------------------------------------

/** Total XP at which `level` advances to `level + 1`. */
export function xpThreshold(level: number): number {
  return level * XP_PER_LEVEL;
}

export function canLevelUp(level: number, xp: number): boolean {
  return xp >= xpThreshold(level);
}

/** Progress from the previous threshold to the next, 0-1. */
export function getXPProgress(xp: number, level: number): number {
  const floor = xpThreshold(level - 1);
  const span = xpThreshold(level) - floor;
  return Math.max(0, Math.min(1, (xp - floor) / span));
}

// ---------------------------------------------------------------------------
// Growth
// ---------------------------------------------------------------------------

/** HP grows by 1d6 + STR/4, MP by 1d4 + WIS/4 (HP rolled first). */
export function rollLevelGrowth(attributes: AttributeBlock, rng: RandomSource): LevelGrowth {
  const { hpGrowthDie, hpStrengthDivisor, mpGrowthDie, mpWisdomDivisor } = BALANCE.leveling;
  const hpIncrease = rollDie(hpGrowthDie, rng) + Math.floor(attributes.strength / hpStrengthDivisor);
  const mpIncrease = rollDie(mpGrowthDie, rng) + Math.floor(attributes.wisdom / mpWisdomDivisor);
  return { hpIncrease, mpIncrease };
}

export function grantsAdvancedSkill(newLevel: number): boolean {
  return newLevel % ADVANCED_SKILL_EVERY === 0;
}

/** A random advanced skill the character does not know yet, if any remain. */
export function pickAdvancedSkill(
  pool: readonly Skill[],
  known: readonly Skill[],
  rng: RandomSource,
): Skill | null {
  const unseen = pool.filter((skill) => !known.some((k) => k.name === skill.name));
  if (unseen.length === 0) return null;
  return { ...rng.pick(unseen) };
}
