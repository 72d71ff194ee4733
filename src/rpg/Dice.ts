/**
 * Dice.ts — 3d6 resolution primitives.
 *
 * All checks in the game sum three six-sided dice rather than a single
 * d20, giving a bell curve centred on 10-11. Every function takes an
 * optional RandomSource so callers can seed or script the rolls.
 */

import { defaultRandom, type RandomSource } from '@/engine/Random';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface DiceRoll {
  results: number[];
  total: number;
}

export interface CheckResult {
  diceResults: number[];
  diceTotal: number;
  modifier: number;
  modifiedTotal: number;
  difficulty: number;
  success: boolean;
  margin: number;
}

export interface CheckOptions {
  count?: number;
  sides?: number;
  rng?: RandomSource;
}

export interface ContestResult {
  attacker: CheckResult;
  defender: CheckResult;
  attackerWins: boolean;
}

// ---------------------------------------------------------------------------
// Primitive rolls
// ---------------------------------------------------------------------------

function assertPositive(value: number, label: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${label} must be a positive integer, got ${value}`);
  }
}

export function rollDie(sides: number = 6, rng: RandomSource = defaultRandom): number {
  assertPositive(sides, 'sides');
  return rng.nextInt(1, sides);
}

export function rollDice(
  count: number = 3,
  sides: number = 6,
  rng: RandomSource = defaultRandom,
): DiceRoll {
  assertPositive(count, 'count');
  assertPositive(sides, 'sides');
  const results: number[] = [];
  for (let i = 0; i < count; i++) {
    results.push(rng.nextInt(1, sides));
  }
  return { results, total: results.reduce((sum, r) => sum + r, 0) };
}

/** The standard resolution roll: sum of three d6 (3-18). */
export function roll3d6(rng: RandomSource = defaultRandom): number {
  return rollDice(3, 6, rng).total;
}

/** Floor division, so 8 gives -1 and 7 gives -2. */
export function attributeModifier(value: number): number {
  return Math.floor((value - 10) / 2);
}

export function checkSuccess(roll: number, difficulty: number): boolean {
  return roll >= difficulty;
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

/**
 * Roll against a difficulty. Ties succeed; `margin` is
 * `modifiedTotal - difficulty`.
 */
export function rollCheck(
  attributeMod: number = 0,
  difficulty: number = 10,
  options: CheckOptions = {},
): CheckResult {
  const { count = 3, sides = 6, rng = defaultRandom } = options;
  const roll = rollDice(count, sides, rng);
  const modifiedTotal = roll.total + attributeMod;
  return {
    diceResults: roll.results,
    diceTotal: roll.total,
    modifier: attributeMod,
    modifiedTotal,
    difficulty,
    success: checkSuccess(modifiedTotal, difficulty),
    margin: modifiedTotal - difficulty,
  };
}

export function rollWithAdvantage(
  attributeMod: number = 0,
  difficulty: number = 10,
  rng: RandomSource = defaultRandom,
): CheckResult {
  const first = rollCheck(attributeMod, difficulty, { rng });
  const second = rollCheck(attributeMod, difficulty, { rng });
  return first.modifiedTotal > second.modifiedTotal ? first : second;
}

export function rollWithDisadvantage(
  attributeMod: number = 0,
  difficulty: number = 10,
  rng: RandomSource = defaultRandom,
): CheckResult {
  const first = rollCheck(attributeMod, difficulty, { rng });
  const second = rollCheck(attributeMod, difficulty, { rng });
  return first.modifiedTotal < second.modifiedTotal ? first : second;
}

/** 4d6, drop the lowest die. */
export function rollAttributeScore(rng: RandomSource = defaultRandom): number {
  const { results } = rollDice(4, 6, rng);
  const kept = [...results].sort((a, b) => b - a).slice(0, 3);
  return kept.reduce((sum, r) => sum + r, 0);
}

/**
 * Opposed 3d6 checks. The attacker must meet or beat the defender's
 * modified total.
 */
export function contestedCheck(
  attackerAttribute: number,
  defenderAttribute: number,
  rng: RandomSource = defaultRandom,
): ContestResult {
  const attacker = rollCheck(attributeModifier(attackerAttribute), 0, { rng });
  const defender = rollCheck(attributeModifier(defenderAttribute), 0, { rng });
  return {
    attacker,
    defender,
    attackerWins: attacker.modifiedTotal >= defender.modifiedTotal,
  };
}
