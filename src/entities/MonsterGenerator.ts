/**
 * MonsterGenerator.ts — Named regular monsters and bosses.
 */

import { z } from 'zod';
import monstersData from '@/data/monsters.json';
import { defaultRandom, type RandomSource } from '@/engine/Random';
import { createBossDrop } from '@/rpg/LootTable';
import {
  MONSTER_TYPES,
  Monster,
  getNameSuffixes,
  type MonsterAbility,
  type MonsterType,
} from '@/entities/Monster';

// ---------------------------------------------------------------------------
// Name and ability tables
// ---------------------------------------------------------------------------

const BossAbilitySchema = z.object({
  name: z.string(),
  /** Flat damage scaled by the boss's base level. */
  damagePerLevel: z.number().optional(),
  effect: z.string().optional(),
  amount: z.number().optional(),
  duration: z.number().optional(),
  target: z.enum(['single', 'all', 'self']).optional(),
  cooldown: z.number().optional(),
});

type BossAbilityTemplate = z.infer<typeof BossAbilitySchema>;

const PREFIXES = z.array(z.string()).min(1).parse(monstersData.prefixes);
const BOSS_NAMES = z.array(z.string()).min(1).parse(monstersData.bossNames);
const BOSS_ABILITIES = z.array(BossAbilitySchema).min(1).parse(monstersData.bossAbilities);

const BOSS_HP_MULTIPLIER = 2;
const BOSS_STAT_BONUS = 2;
const BOSS_LEVEL_BONUS = 2;

function toBossAbility(template: BossAbilityTemplate, level: number): MonsterAbility {
  const ability: MonsterAbility = { name: template.name };
  if (template.damagePerLevel !== undefined) ability.damage = template.damagePerLevel * level;
  if (template.effect !== undefined) ability.effect = template.effect;
  if (template.amount !== undefined) ability.amount = template.amount;
  if (template.duration !== undefined) ability.duration = template.duration;
  if (template.target !== undefined) ability.target = template.target;
  if (template.cooldown !== undefined) ability.cooldown = template.cooldown;
  return ability;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** "Lvl {level} {prefix} {suffix}", with a random type unless one is given. */
export function generateMonster(
  level: number,
  monsterType?: MonsterType,
  rng: RandomSource = defaultRandom,
): Monster {
  const type = monsterType ?? rng.pick(MONSTER_TYPES);
  const prefix = rng.pick(PREFIXES);
  const suffix = rng.pick(getNameSuffixes(type));
  return new Monster(`Lvl ${level} ${prefix} ${suffix}`, level, { monsterType: type }, rng);
}

/**
 * A boss two levels above `level`: double HP, +2 attack and defense, one
 * boss-only ability and a guaranteed "{Theme} Core Fragment" drop.
 */
export function generateBoss(
  level: number,
  theme: string = 'neon',
  rng: RandomSource = defaultRandom,
): Monster {
  const name = rng.pick(BOSS_NAMES);
  const boss = new Monster(name, level + BOSS_LEVEL_BONUS, {}, rng);

  boss.maxHp *= BOSS_HP_MULTIPLIER;
  boss.hp = boss.maxHp;
  boss.attack += BOSS_STAT_BONUS;
  boss.defense += BOSS_STAT_BONUS;

  boss.abilities.push(toBossAbility(rng.pick(BOSS_ABILITIES), level));
  boss.loot.push(createBossDrop(level, theme));
  return boss;
}
