/**
 * SkillSystem.ts — Fixed effect table for character skills.
 *
 * Skills are keyed by name. A skill missing from the table still costs MP
 * but has no mechanical effect.
 */

import { rollDice, rollDie, attributeModifier } from '@/rpg/Dice';
import type { AttributeBlock } from '@/rpg/StatSystem';
import type { RandomSource } from '@/engine/Random';
import { EffectType, type EffectSpec } from '@/combat/StatusEffectSystem';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SkillArea = 'single' | 'all' | 'self';

export type SkillEffectDef =
  | { kind: 'damage'; area: 'single' | 'all'; roll: (attrs: AttributeBlock, rng: RandomSource) => number }
  | { kind: 'healing'; area: 'single' | 'all'; roll: (attrs: AttributeBlock, rng: RandomSource) => number }
  | { kind: 'buff'; area: 'self'; effect: EffectSpec };

export type SkillOutcome =
  | { kind: 'damage'; area: 'single' | 'all'; amount: number }
  | { kind: 'healing'; area: 'single' | 'all'; amount: number }
  | { kind: 'buff'; area: 'self'; effect: EffectSpec };

// ---------------------------------------------------------------------------
// Table
// ---------------------------------------------------------------------------

const SKILL_EFFECTS: Record<string, SkillEffectDef> = {
  // Starting skills
  'Power Attack': {
    kind: 'damage',
    area: 'single',
    roll: (attrs, rng) => rollDie(8, rng) + Math.floor(attrs.strength / 2) + 2,
  },
  'Defend': { kind: 'buff', area: 'self', effect: { type: EffectType.DEFEND, amount: 2, duration: 1 } },
  'Arcane Missile': { kind: 'damage', area: 'single', roll: (_attrs, rng) => rollDie(4, rng) + 1 },
  'Shield': { kind: 'buff', area: 'self', effect: { type: EffectType.INCREASE_DEFENSE, amount: 2, duration: 3 } },
  'Heal': { kind: 'healing', area: 'single', roll: (_attrs, rng) => rollDie(6, rng) + 1 },
  'Bless': { kind: 'buff', area: 'self', effect: { type: EffectType.INCREASE_ATTACK, amount: 1, duration: 3 } },
  'Quick Shot': { kind: 'damage', area: 'single', roll: (_attrs, rng) => rollDie(6, rng) },
  'Evade': { kind: 'buff', area: 'self', effect: { type: EffectType.INCREASE_DEFENSE, amount: 3, duration: 1 } },

  // Advanced skills
  'Whirlwind': {
    kind: 'damage',
    area: 'all',
    roll: (attrs, rng) => Math.max(1, rollDie(6, rng) + attributeModifier(attrs.strength)),
  },
  'Unbreakable': { kind: 'buff', area: 'self', effect: { type: EffectType.INCREASE_DEFENSE, amount: 4, duration: 2 } },
  'Fireball': { kind: 'damage', area: 'all', roll: (_attrs, rng) => rollDice(2, 6, rng).total },
  'Mass Heal': { kind: 'healing', area: 'all', roll: (_attrs, rng) => rollDice(2, 4, rng).total },
  'Sneak Attack': {
    kind: 'damage',
    area: 'single',
    roll: (attrs, rng) => Math.max(1, rollDice(2, 6, rng).total + attributeModifier(attrs.dexterity)),
  },
};

export function getSkillEffect(name: string): SkillEffectDef | undefined {
  return Object.hasOwn(SKILL_EFFECTS, name) ? SKILL_EFFECTS[name] : undefined;
}

/** Roll a skill's effect. Returns null for skills with no table entry. */
export function resolveSkillEffect(
  name: string,
  attributes: AttributeBlock,
  rng: RandomSource,
): SkillOutcome | null {
  const def = getSkillEffect(name);
  if (!def) return null;
  switch (def.kind) {
    case 'damage':
      return { kind: 'damage', area: def.area, amount: def.roll(attributes, rng) };
    case 'healing':
      return { kind: 'healing', area: def.area, amount: def.roll(attributes, rng) };
    case 'buff':
      return { kind: 'buff', area: 'self', effect: { ...def.effect } };
  }
}
