// ---------------------------------------------------------------------------
// EnemyAI.ts — Action choice for monster turns
// ---------------------------------------------------------------------------
// Monsters always go after the player character. Most turns are a plain
// attack; the rest pick one of the monster's abilities at random.
// ---------------------------------------------------------------------------

import { BALANCE } from '@/engine/Balance';
import { defaultRandom, type RandomSource } from '@/engine/Random';
import type { Monster } from '@/entities/Monster';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export enum AIActionType {
  ATTACK = 'attack',
  USE_ABILITY = 'ability',
}

export type AIAction =
  | { type: AIActionType.ATTACK }
  | { type: AIActionType.USE_ABILITY; abilityIndex: number };

// ---------------------------------------------------------------------------
// Decision
// ---------------------------------------------------------------------------

/**
 * Attack with probability `monsterAttackChance`, otherwise use a uniformly
 * chosen ability. Monsters without abilities always attack. The attack roll
 * is drawn even then, so the stream advances the same way for every
 * monster.
 */
export function chooseMonsterAction(
  monster: Monster,
  rng: RandomSource = defaultRandom,
): AIAction {
  const attacks = rng.next() < BALANCE.combat.monsterAttackChance;
  if (attacks || monster.abilities.length === 0) {
    return { type: AIActionType.ATTACK };
  }
  return {
    type: AIActionType.USE_ABILITY,
    abilityIndex: rng.nextInt(0, monster.abilities.length - 1),
  };
}
