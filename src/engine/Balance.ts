/**
 * Balance.ts — Tunable game constants loaded from balance.json.
 *
 * The file is validated once at import; a malformed table is a build
 * defect, so the zod error is allowed to surface.
 */

import { z } from 'zod';
import balanceData from '@/data/balance.json';

const probability = z.number().min(0).max(1);

const BalanceSchema = z.object({
  leveling: z.object({
    xpPerLevel: z.number().int().positive(),
    advancedSkillEvery: z.number().int().positive(),
    hpGrowthDie: z.number().int().positive(),
    hpStrengthDivisor: z.number().int().positive(),
    mpGrowthDie: z.number().int().positive(),
    mpWisdomDivisor: z.number().int().positive(),
  }),
  rewards: z.object({
    combatXpPerDungeonLevel: z.number().int().min(0),
    dungeonXpPerDungeonLevel: z.number().int().min(0),
  }),
  combat: z.object({
    defendBonus: z.number().int(),
    defendReduction: z.number().int(),
    defendDuration: z.number().int().positive(),
    monsterAttackChance: probability,
    fleeBaseDifficulty: z.number().int(),
    summaryLogLines: z.number().int().positive(),
    defaultPotionAmount: z.number().int().positive(),
    defaultBuffAmount: z.number().int(),
    defaultBuffDuration: z.number().int().positive(),
  }),
  dungeon: z.object({
    linkProbability: z.object({
      bsp: probability,
      maze: probability,
      cellular: probability,
    }),
    population: z.object({
      combat: probability,
      treasure: probability,
      puzzle: probability,
      rest: probability,
    }),
    perceptionDifficulty: z.number().int(),
    restHealDie: z.number().int().positive(),
  }),
  encounters: z.object({
    ambushChance: probability,
    trapChance: probability,
    bossMinionChance: probability,
    maxCombatMonsters: z.number().int().positive(),
  }),
  loot: z.object({
    variance: probability,
  }),
});

export type Balance = z.infer<typeof BalanceSchema>;

export const BALANCE: Balance = BalanceSchema.parse(balanceData);
