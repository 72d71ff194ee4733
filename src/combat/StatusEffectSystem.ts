// ---------------------------------------------------------------------------
// StatusEffectSystem.ts — Timed combat effects (defend, DOTs, buffs, debuffs)
// ---------------------------------------------------------------------------
// Effects reference participants by index into CombatState.participants.
// Durations count actions, not seconds.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

/** Effect types the engine reads. Unknown types still tick down and expire. */
export enum EffectType {
  DEFEND = 'defend',
  DAMAGE_OVER_TIME = 'damage_over_time',
  REDUCE_MP = 'reduce_mp',
  INCREASE_ATTACK = 'increase_attack',
  WEAKEN = 'weaken',
  REDUCE_DEFENSE = 'reduce_defense',
  INCREASE_DEFENSE = 'increase_defense',
  SHIELD = 'shield',
}

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface ActiveEffect {
  type: string;
  /** Participant index of whoever applied the effect. */
  source: number;
  /** Participant index of the affected participant. */
  target: number;
  /** Remaining actions before expiry. */
  duration: number;
  amount: number;
  description: string;
}

/** A buff or debuff to be turned into an ActiveEffect. */
export interface EffectSpec {
  type: string;
  amount: number;
  duration: number;
}

// ---------------------------------------------------------------------------
// Attack-time modifiers
// ---------------------------------------------------------------------------

const ATTACK_BONUS = new Map<string, 1 | -1>([
  [EffectType.INCREASE_ATTACK, 1],
  [EffectType.WEAKEN, -1],
]);

const DEFENSE_BONUS = new Map<string, 1 | -1>([
  [EffectType.INCREASE_DEFENSE, 1],
  [EffectType.SHIELD, 1],
  [EffectType.REDUCE_DEFENSE, -1],
]);

function sumModifiers(
  effects: readonly ActiveEffect[],
  participant: number,
  table: ReadonlyMap<string, 1 | -1>,
): number {
  let total = 0;
  for (const effect of effects) {
    if (effect.target !== participant) continue;
    const sign = table.get(effect.type);
    if (sign !== undefined) total += sign * effect.amount;
  }
  return total;
}

/** Net bonus added to a participant's attack roll. */
export function attackModifier(effects: readonly ActiveEffect[], participant: number): number {
  return sumModifiers(effects, participant, ATTACK_BONUS);
}

/** Net bonus added to a participant's defense (defend is handled separately). */
export function defenseModifier(effects: readonly ActiveEffect[], participant: number): number {
  return sumModifiers(effects, participant, DEFENSE_BONUS);
}

export function isDefending(effects: readonly ActiveEffect[], participant: number): boolean {
  return effects.some((e) => e.type === EffectType.DEFEND && e.target === participant);
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

export function createEffect(
  spec: EffectSpec,
  source: number,
  target: number,
  description: string,
): ActiveEffect {
  return {
    type: spec.type,
    source,
    target,
    duration: spec.duration,
    amount: spec.amount,
    description,
  };
}

/**
 * Count every non-defend effect down by one action. Defend effects are left
 * alone; they end when their owner's next turn starts.
 */
export function decrementDurations(effects: readonly ActiveEffect[]): {
  remaining: ActiveEffect[];
  expired: ActiveEffect[];
} {
  const remaining: ActiveEffect[] = [];
  const expired: ActiveEffect[] = [];
  for (const effect of effects) {
    if (effect.type === EffectType.DEFEND) {
      remaining.push(effect);
      continue;
    }
    const next = { ...effect, duration: effect.duration - 1 };
    if (next.duration > 0) remaining.push(next);
    else expired.push(next);
  }
  return { remaining, expired };
}

/** Drop the defend effects targeting `participant`. */
export function clearDefend(
  effects: readonly ActiveEffect[],
  participant: number,
): { remaining: ActiveEffect[]; cleared: boolean } {
  const remaining = effects.filter(
    (e) => !(e.type === EffectType.DEFEND && e.target === participant),
  );
  return { remaining, cleared: remaining.length !== effects.length };
}
