// ---------------------------------------------------------------------------
// CombatManager.ts — Turn-based 3d6 combat
// ---------------------------------------------------------------------------
// Combat lives in a plain CombatState record. Every call acts for the
// participant whose turn it is, appends narrative to `state.log` and
// returns the same (mutated) state. Rule violations are log lines, never
// exceptions; the turn still passes.
// ---------------------------------------------------------------------------

import { BALANCE } from '@/engine/Balance';
import { createLogger } from '@/engine/Logger';
import { defaultRandom, type RandomSource } from '@/engine/Random';
import { rollCheck, rollDie } from '@/rpg/Dice';
import { Attribute, applyDamage, applyHealing, getModifier } from '@/rpg/StatSystem';
import { getSkillEffect } from '@/rpg/SkillSystem';
import type { Character } from '@/entities/Character';
import type { Monster, MonsterAbility } from '@/entities/Monster';
import { EncounterType, type Encounter } from '@/world/Encounter';
import { AIActionType, chooseMonsterAction } from '@/combat/EnemyAI';
import {
  EffectType,
  attackModifier,
  clearDefend,
  createEffect,
  decrementDurations,
  defenseModifier,
  isDefending,
  type ActiveEffect,
} from '@/combat/StatusEffectSystem';

const log = createLogger('Combat');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export enum CombatStatus {
  ACTIVE = 'ACTIVE',
  VICTORY = 'VICTORY',
  DEFEAT = 'DEFEAT',
  FLED = 'FLED',
}

export type Participant =
  | { type: 'character'; entity: Character }
  | { type: 'monster'; entity: Monster };

export interface InitiativeEntry {
  /** Index into `participants`. */
  participant: number;
  roll: number;
}

export interface CombatState {
  participants: Participant[];
  /** Sorted by roll, highest first; ties keep participant order. */
  initiativeOrder: InitiativeEntry[];
  /** Index into `initiativeOrder`. */
  currentTurn: number;
  round: number;
  status: CombatStatus;
  log: string[];
  activeEffects: ActiveEffect[];
  encounter: Encounter | null;
}

export type CombatAction = 'attack' | 'defend' | 'ability' | 'item' | 'flee';

export interface ActionOptions {
  targetIndex?: number;
  abilityIndex?: number;
  itemIndex?: number;
}

export interface CombatSummary {
  round: number;
  currentTurn: string;
  isPlayerTurn: boolean;
  character: { name: string; hp: number; maxHp: number; mp: number; maxMp: number };
  monsters: { name: string; hp: number; maxHp: number }[];
  log: string[];
  status: CombatStatus;
}

// ---------------------------------------------------------------------------
// Participant helpers
// ---------------------------------------------------------------------------

function isAlive(p: Participant): boolean {
  return p.entity.hp > 0;
}

function strengthMod(p: Participant): number {
  return getModifier(p.entity.attributes, Attribute.STRENGTH);
}

function dexterityMod(p: Participant): number {
  return getModifier(p.entity.attributes, Attribute.DEXTERITY);
}

/** Participant whose turn it is. */
export function currentIndex(state: CombatState): number {
  return state.initiativeOrder[state.currentTurn].participant;
}

export function currentParticipant(state: CombatState): Participant {
  return state.participants[currentIndex(state)];
}

export function isCharacterTurn(state: CombatState): boolean {
  return currentParticipant(state).type === 'character';
}

function characterOf(state: CombatState): Character | null {
  for (const p of state.participants) {
    if (p.type === 'character') return p.entity;
  }
  return null;
}

/** Valid participant index, or null. */
function resolveTarget(state: CombatState, index: number | undefined): number | null {
  if (index === undefined || !Number.isInteger(index)) return null;
  return index >= 0 && index < state.participants.length ? index : null;
}

function livingOpponents(state: CombatState, actor: number): number[] {
  const side = state.participants[actor].type;
  const result: number[] = [];
  state.participants.forEach((p, i) => {
    if (p.type !== side && isAlive(p)) result.push(i);
  });
  return result;
}

/** Damage a participant and log the defeat line when it drops. */
function dealDamage(state: CombatState, index: number, amount: number): number {
  const target = state.participants[index];
  const dealt = applyDamage(target.entity, amount);
  if (target.entity.hp <= 0) {
    target.entity.hp = 0;
    state.log.push(`${target.entity.name} is defeated!`);
  }
  return dealt;
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/** 3d6 + dexterity modifier per participant, rolled in participant order. */
function rollInitiative(participants: readonly Participant[], rng: RandomSource): InitiativeEntry[] {
  const entries = participants.map((p, participant) => ({
    participant,
    roll: rollCheck(dexterityMod(p), 0, { rng }).modifiedTotal,
  }));
  return entries.sort((a, b) => b.roll - a.roll);
}

/**
 * Character first, then every living monster. An ambushing encounter moves
 * the character to the back of the initiative order. A character already
 * at 0 HP loses on the spot.
 */
export function startCombat(
  character: Character,
  monsters: readonly Monster[],
  encounter: Encounter | null = null,
  rng: RandomSource = defaultRandom,
): CombatState {
  const participants: Participant[] = [{ type: 'character', entity: character }];
  for (const monster of monsters) {
    if (monster.hp > 0) participants.push({ type: 'monster', entity: monster });
  }

  let initiativeOrder = rollInitiative(participants, rng);
  const combatLog = ['Combat begins!'];

  const details = encounter?.details;
  if (details && details.type === EncounterType.COMBAT && details.ambush) {
    initiativeOrder = [
      ...initiativeOrder.filter((e) => e.participant !== 0),
      ...initiativeOrder.filter((e) => e.participant === 0),
    ];
    combatLog.push('Ambush! The enemies strike first.');
  }

  log.debug(`Combat started with ${participants.length - 1} monsters`);
  const state: CombatState = {
    participants,
    initiativeOrder,
    currentTurn: 0,
    round: 1,
    status: CombatStatus.ACTIVE,
    log: combatLog,
    activeEffects: [],
    encounter,
  };
  if (character.hp <= 0) checkCombatEnd(state);
  return state;
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

function processAttack(state: CombatState, actor: number, targetIndex: number | undefined, rng: RandomSource): void {
  const attacker = state.participants[actor];
  const t = resolveTarget(state, targetIndex);
  if (t === null) {
    state.log.push(`${attacker.entity.name} attacks but has no target!`);
    return;
  }
  const target = state.participants[t];
  if (!isAlive(target)) {
    state.log.push(`${target.entity.name} is already defeated!`);
    return;
  }

  const defending = isDefending(state.activeEffects, t);
  const defense =
    target.entity.defense +
    defenseModifier(state.activeEffects, t) +
    (defending ? BALANCE.combat.defendBonus : 0);
  const str = strengthMod(attacker);
  const attack = rollCheck(str + attackModifier(state.activeEffects, actor), defense, { rng });

  state.log.push(`${attacker.entity.name} attacks ${target.entity.name}.`);
  state.log.push(`Attack roll: ${attack.modifiedTotal} vs Defense: ${defense}`);

  if (!attack.success) {
    state.log.push(`Miss! ${target.entity.name} avoids the attack.`);
    return;
  }

  let damage = rollDie(6, rng) + str;
  if (defending) damage -= BALANCE.combat.defendReduction;
  damage = Math.max(1, damage);
  state.log.push(`Hit! ${target.entity.name} takes ${damage} damage.`);
  dealDamage(state, t, damage);
}

function processDefend(state: CombatState, actor: number): void {
  state.activeEffects.push(
    createEffect(
      { type: EffectType.DEFEND, amount: BALANCE.combat.defendBonus, duration: BALANCE.combat.defendDuration },
      actor,
      actor,
      'Defending',
    ),
  );
  state.log.push(`${state.participants[actor].entity.name} takes a defensive stance.`);
}

function processAbility(
  state: CombatState,
  actor: number,
  targetIndex: number | undefined,
  abilityIndex: number | undefined,
  rng: RandomSource,
): void {
  const user = state.participants[actor];
  if (abilityIndex === undefined) {
    state.log.push(`${user.entity.name} tries to use an ability but fails!`);
    return;
  }

  if (user.type === 'character') {
    useCharacterSkill(state, actor, user.entity, targetIndex, abilityIndex, rng);
    return;
  }

  const ability = user.entity.abilities[abilityIndex];
  if (!Number.isInteger(abilityIndex) || !ability) {
    state.log.push(`${user.entity.name} tries to use an invalid ability!`);
    return;
  }
  state.log.push(`${user.entity.name} uses ${ability.name}!`);
  useMonsterAbility(state, actor, ability, resolveTarget(state, targetIndex), rng);
}

function useMonsterAbility(
  state: CombatState,
  actor: number,
  ability: MonsterAbility,
  target: number | null,
  rng: RandomSource,
): void {
  const user = state.participants[actor];
  const area = ability.target ?? 'single';
  const liveTarget = target !== null && isAlive(state.participants[target]) ? target : null;

  if (ability.damageMultiplier !== undefined) {
    if (liveTarget === null) {
      state.log.push('No target for the ability!');
      return;
    }
    const base = rollDie(6, rng) + strengthMod(user);
    const damage = Math.max(1, Math.trunc(base * ability.damageMultiplier));
    state.log.push(`${state.participants[liveTarget].entity.name} takes ${damage} damage!`);
    const dealt = dealDamage(state, liveTarget, damage);
    drainLife(state, actor, ability, dealt);
    return;
  }

  if (ability.effect !== undefined) {
    const spec = { type: ability.effect, amount: ability.amount ?? 0, duration: ability.duration ?? 1 };
    if (area === 'all') {
      for (const t of livingOpponents(state, actor)) {
        state.activeEffects.push(createEffect(spec, actor, t, ability.name));
      }
      state.log.push(`The effect ${ability.name} is applied!`);
      return;
    }
    const affected = area === 'self' ? actor : liveTarget;
    if (affected === null) {
      state.log.push('No target for the ability!');
      return;
    }
    state.activeEffects.push(createEffect(spec, actor, affected, ability.name));
    state.log.push(`${state.participants[affected].entity.name} is affected by ${ability.name}!`);
    return;
  }

  if (ability.damage !== undefined) {
    const damage = ability.damage;
    const targets = area === 'all' ? livingOpponents(state, actor) : liveTarget === null ? [] : [liveTarget];
    if (targets.length === 0) {
      state.log.push('No target for the ability!');
      return;
    }
    let dealt = 0;
    for (const t of targets) {
      state.log.push(`${state.participants[t].entity.name} takes ${damage} damage!`);
      dealt += dealDamage(state, t, damage);
    }
    drainLife(state, actor, ability, dealt);
  }
}

/** heal_percent abilities give the user a share of the damage dealt. */
function drainLife(state: CombatState, actor: number, ability: MonsterAbility, dealt: number): void {
  if (ability.healPercent === undefined || dealt <= 0) return;
  const user = state.participants[actor];
  const healed = applyHealing(user.entity, Math.floor((dealt * ability.healPercent) / 100));
  if (healed > 0) state.log.push(`${user.entity.name} recovers ${healed} HP!`);
}

/** Characters act through their skill list; MP and effects come from useSkill. */
function useCharacterSkill(
  state: CombatState,
  actor: number,
  character: Character,
  targetIndex: number | undefined,
  abilityIndex: number,
  rng: RandomSource,
): void {
  const skill = character.skills[abilityIndex];
  if (!Number.isInteger(abilityIndex) || !skill) {
    state.log.push(`${character.name} tries to use an invalid ability!`);
    return;
  }
  state.log.push(`${character.name} uses ${skill.name}!`);

  const def = getSkillEffect(skill.name);
  const t = resolveTarget(state, targetIndex);
  const liveTarget = t !== null && isAlive(state.participants[t]) ? t : null;
  if (def?.kind === 'damage' && def.area === 'single' && liveTarget === null) {
    state.log.push('No target for the ability!');
    return;
  }

  const result = character.useSkill(skill.name, undefined, rng);
  if (!result.success) {
    state.log.push(result.message);
    return;
  }

  if (result.damage !== undefined) {
    const targets = result.area === 'all' ? livingOpponents(state, actor) : liveTarget === null ? [] : [liveTarget];
    for (const target of targets) {
      state.log.push(`${state.participants[target].entity.name} takes ${result.damage} damage!`);
      dealDamage(state, target, result.damage);
    }
  } else if (result.healing !== undefined) {
    state.log.push(`${character.name} is healed for ${result.healing} HP!`);
  } else if (result.effect) {
    state.activeEffects.push(createEffect(result.effect, actor, actor, skill.name));
    state.log.push(`${character.name} is affected by ${skill.name}!`);
  } else {
    state.log.push(result.message);
  }
}

function processItem(
  state: CombatState,
  actor: number,
  targetIndex: number | undefined,
  itemIndex: number | undefined,
): void {
  const user = state.participants[actor];
  if (user.type !== 'character') {
    state.log.push(`${user.entity.name} can't use items!`);
    return;
  }
  const character = user.entity;
  if (itemIndex === undefined) {
    state.log.push(`${character.name} tries to use an item but fails!`);
    return;
  }
  const item = character.removeItemAt(itemIndex);
  if (!item) {
    state.log.push(`${character.name} tries to use an invalid item!`);
    return;
  }

  state.log.push(`${character.name} uses ${item.name}!`);
  if (item.type !== 'consumable') return;

  const t = resolveTarget(state, targetIndex) ?? actor;
  const target = state.participants[t];
  const { defaultPotionAmount, defaultBuffAmount, defaultBuffDuration } = BALANCE.combat;

  switch (item.subtype) {
    case 'health_potion': {
      const healed = applyHealing(target.entity, item.amount ?? defaultPotionAmount);
      state.log.push(`${target.entity.name} is healed for ${healed} HP!`);
      break;
    }
    case 'mana_potion': {
      const restored = target.type === 'character' ? target.entity.restoreMp(item.amount ?? defaultPotionAmount) : 0;
      state.log.push(`${target.entity.name} restores ${restored} MP!`);
      break;
    }
    case 'buff_item':
      state.activeEffects.push(
        createEffect(
          {
            type: item.effect ?? EffectType.INCREASE_ATTACK,
            amount: item.amount ?? defaultBuffAmount,
            duration: item.duration ?? defaultBuffDuration,
          },
          actor,
          t,
          item.name,
        ),
      );
      state.log.push(`${target.entity.name} is buffed by ${item.name}!`);
      break;
    default:
      break;
  }
}

/** True when the escape succeeded. */
function processFlee(state: CombatState, actor: number, rng: RandomSource): boolean {
  const p = state.participants[actor];
  if (p.type !== 'character') {
    state.log.push(`${p.entity.name} can't flee!`);
    return false;
  }
  const difficulty = BALANCE.combat.fleeBaseDifficulty + (state.participants.length - 1);
  const check = rollCheck(dexterityMod(p), difficulty, { rng });
  state.log.push(`${p.entity.name} attempts to flee!`);
  if (check.success) {
    state.status = CombatStatus.FLED;
    state.log.push(`${p.entity.name} successfully escapes!`);
    return true;
  }
  state.log.push(`${p.entity.name} fails to escape!`);
  return false;
}

// ---------------------------------------------------------------------------
// Turn cycle
// ---------------------------------------------------------------------------

/** Tick damage-over-time and drains, then count every effect down. */
function applyEffects(state: CombatState): void {
  for (const effect of state.activeEffects) {
    const target = state.participants[effect.target];
    if (!target || !isAlive(target)) continue;

    if (effect.type === EffectType.DAMAGE_OVER_TIME) {
      state.log.push(`${target.entity.name} takes ${effect.amount} damage from ${effect.description}!`);
      dealDamage(state, effect.target, effect.amount);
    } else if (effect.type === EffectType.REDUCE_MP && target.type === 'character') {
      const drained = Math.min(target.entity.mp, effect.amount);
      target.entity.mp -= drained;
      state.log.push(`${target.entity.name} loses ${drained} MP from ${effect.description}!`);
    }
  }

  const { remaining, expired } = decrementDurations(state.activeEffects);
  for (const effect of expired) {
    state.log.push(`The effect ${effect.description} has worn off.`);
  }
  state.activeEffects = remaining;
}

function checkCombatEnd(state: CombatState): void {
  const characterDown = state.participants.every((p) => p.type !== 'character' || !isAlive(p));
  const monstersDown = state.participants.every((p) => p.type !== 'monster' || !isAlive(p));

  if (characterDown) {
    state.status = CombatStatus.DEFEAT;
    state.log.push('You have been defeated!');
  } else if (monstersDown) {
    state.status = CombatStatus.VICTORY;
    state.log.push('Victory! All enemies have been defeated!');
    if (state.encounter) state.encounter.completed = true;
  }
}

/**
 * Advance to the next living participant, logging each new round. The
 * incoming participant's defend stance ends here.
 */
export function nextTurn(state: CombatState): CombatState {
  const count = state.initiativeOrder.length;
  for (let step = 0; step < count; step++) {
    state.currentTurn = (state.currentTurn + 1) % count;
    if (state.currentTurn === 0) {
      state.round += 1;
      state.log.push(`Round ${state.round} begins!`);
    }
    if (isAlive(currentParticipant(state))) break;
  }

  const idx = currentIndex(state);
  const name = state.participants[idx].entity.name;
  state.log.push(`${name}'s turn.`);

  const { remaining, cleared } = clearDefend(state.activeEffects, idx);
  if (cleared) {
    state.activeEffects = remaining;
    state.log.push(`${name} is no longer defending.`);
  }
  return state;
}

/**
 * Perform `action` for the current participant, then tick effects, check
 * for the end of combat and pass the turn. Finished combats are returned
 * untouched.
 */
export function processAction(
  state: CombatState,
  action: CombatAction,
  options: ActionOptions = {},
  rng: RandomSource = defaultRandom,
): CombatState {
  if (state.status !== CombatStatus.ACTIVE) return state;

  const actor = currentIndex(state);
  switch (action) {
    case 'attack':
      processAttack(state, actor, options.targetIndex, rng);
      break;
    case 'defend':
      processDefend(state, actor);
      break;
    case 'ability':
      processAbility(state, actor, options.targetIndex, options.abilityIndex, rng);
      break;
    case 'item':
      processItem(state, actor, options.targetIndex, options.itemIndex);
      break;
    case 'flee':
      if (processFlee(state, actor, rng)) return state;
      break;
  }

  applyEffects(state);
  checkCombatEnd(state);
  if (state.status === CombatStatus.ACTIVE) nextTurn(state);
  return state;
}

/**
 * Monster turn: target the first living character and let the AI pick
 * between a plain attack and an ability. Does nothing on a character's turn.
 */
export function autoAction(state: CombatState, rng: RandomSource = defaultRandom): CombatState {
  if (state.status !== CombatStatus.ACTIVE) return state;
  const current = currentParticipant(state);
  if (current.type !== 'monster') return state;

  const targetIndex = state.participants.findIndex((p) => p.type === 'character' && isAlive(p));
  if (targetIndex < 0) {
    state.log.push(`${current.entity.name} has no valid target!`);
    checkCombatEnd(state);
    return state.status === CombatStatus.ACTIVE ? nextTurn(state) : state;
  }

  const choice = chooseMonsterAction(current.entity, rng);
  if (choice.type === AIActionType.ATTACK) {
    return processAction(state, 'attack', { targetIndex }, rng);
  }
  return processAction(state, 'ability', { targetIndex, abilityIndex: choice.abilityIndex }, rng);
}

// ---------------------------------------------------------------------------
// Read-only view
// ---------------------------------------------------------------------------

export function getCombatSummary(state: CombatState): CombatSummary {
  const current = currentParticipant(state);
  const character = characterOf(state);
  return {
    round: state.round,
    currentTurn: current.entity.name,
    isPlayerTurn: current.type === 'character',
    character: character
      ? { name: character.name, hp: character.hp, maxHp: character.maxHp, mp: character.mp, maxMp: character.maxMp }
      : { name: '', hp: 0, maxHp: 0, mp: 0, maxMp: 0 },
    monsters: state.participants
      .filter((p) => p.type === 'monster' && isAlive(p))
      .map((p) => ({ name: p.entity.name, hp: p.entity.hp, maxHp: p.entity.maxHp })),
    log: state.log.slice(-BALANCE.combat.summaryLogLines),
    status: state.status,
  };
}
