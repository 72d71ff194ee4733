/**
 * ExplorationSystem.ts — Walking a character through a dungeon level.
 *
 * All session data lives in an ExplorationState record that the caller
 * owns and passes back in. Room entry, combat start and combat aftermath
 * (loot, XP, defeat respawn) are sequenced here.
 */

import { BALANCE } from '@/engine/Balance';
import { GameError } from '@/engine/Errors';
import { createLogger } from '@/engine/Logger';
import { defaultRandom, type RandomSource } from '@/engine/Random';
import { toInventoryItem, type Item } from '@/rpg/Item';
import type { Character } from '@/entities/Character';
import {
  CombatStatus,
  autoAction,
  isCharacterTurn,
  startCombat,
  type CombatState,
} from '@/combat/CombatManager';
import type { DungeonLevel } from '@/world/DungeonLevel';
import { DIRECTION_NAMES, type Direction, type Room } from '@/world/Room';

const log = createLogger('Exploration');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExplorationState {
  character: Character;
  dungeon: DungeonLevel;
  row: number;
  col: number;
  combat: CombatState | null;
  completed: boolean;
  log: string[];
}

export interface CombatResolution {
  status: CombatStatus;
  xpGained: number;
  leveledUp: boolean;
  loot: Item[];
}

export interface DungeonCompletion {
  success: boolean;
  xpGained: number;
  leveledUp: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function currentRoom(state: ExplorationState): Room {
  return state.dungeon.at(state.row, state.col);
}

function inCombat(state: ExplorationState): boolean {
  return state.combat !== null && state.combat.status === CombatStatus.ACTIVE;
}

function placeAt(state: ExplorationState, room: Room): void {
  state.row = room.row;
  state.col = room.col;
  state.dungeon.discoverRoom(room.row, room.col);
}

function takeItems(state: ExplorationState, items: readonly Item[]): void {
  for (const item of items) {
    state.character.addItem(toInventoryItem(item));
    state.log.push(`Added ${item.name} to your inventory!`);
  }
}

/** Respawn at the entrance with half HP, at least 1. */
function reviveAtEntrance(state: ExplorationState): void {
  const { character, dungeon } = state;
  character.hp = Math.max(1, Math.floor(character.maxHp / 2));
  if (dungeon.entrance) placeAt(state, dungeon.entrance);
  state.log.push('You wake up at the dungeon entrance with reduced health.');
}

/** Count trap conditions down by one room; expired ones are dropped. */
function tickStatusEffects(state: ExplorationState): void {
  const { character } = state;
  for (const effect of character.statusEffects) {
    effect.duration -= 1;
    if (effect.duration <= 0) state.log.push(`The ${effect.type} effect wears off.`);
  }
  character.statusEffects = character.statusEffects.filter((e) => e.duration > 0);
}

function grantXp(state: ExplorationState, amount: number, rng: RandomSource): boolean {
  const leveledUp = state.character.gainXp(amount, rng);
  if (leveledUp) state.log.push(`Level up! You are now level ${state.character.level}.`);
  return leveledUp;
}

/**
 * Run the room's entry effects: narrative, found treasure, trap teleports
 * and combat start. A trap that drops the character to 0 HP counts as a
 * defeat.
 */
function processRoomEntry(state: ExplorationState, rng: RandomSource): void {
  const room = currentRoom(state);
  const result = room.enterRoom(state.character, rng);
  state.log.push(...result.events);
  takeItems(state, result.treasuresFound);

  if (state.character.hp <= 0) {
    state.log.push('You collapse from your wounds!');
    reviveAtEntrance(state);
    return;
  }

  const distance = result.trap?.teleportDistance;
  if (distance !== undefined) {
    // Thrown back toward the entrance row.
    const row = Math.min(state.dungeon.rows - 1, room.row + distance);
    const landing = state.dungeon.at(row, room.col);
    placeAt(state, landing);
    landing.visited = true;
    state.log.push(`You land in ${landing.name}.`);
    return;
  }

  if (result.encountersTriggered) beginRoomCombat(state, rng);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Place the character at the entrance and run its entry effects. */
export function enterDungeon(
  character: Character,
  dungeon: DungeonLevel,
  rng: RandomSource = defaultRandom,
): ExplorationState {
  const { entrance } = dungeon;
  if (!entrance) {
    throw new GameError('NO_ENTRANCE', `${dungeon.name} has no entrance`);
  }

  const state: ExplorationState = {
    character,
    dungeon,
    row: entrance.row,
    col: entrance.col,
    combat: null,
    completed: false,
    log: [],
  };
  placeAt(state, entrance);
  processRoomEntry(state, rng);
  log.info(`${character.name} entered ${dungeon.name}`);
  return state;
}

/**
 * Step through an open link. Returns false when the move is refused.
 * Each step counts trap conditions down by one.
 */
export function moveTo(
  state: ExplorationState,
  direction: Direction,
  rng: RandomSource = defaultRandom,
): boolean {
  if (inCombat(state)) {
    state.log.push("You can't leave while in combat!");
    return false;
  }
  if (state.character.hp <= 0) {
    state.log.push('You are too badly hurt to move!');
    return false;
  }

  const room = currentRoom(state);
  const next = room.linked(direction) ? state.dungeon.getAdjacentRoom(room, direction) : null;
  if (!next) {
    state.log.push("You can't move in that direction!");
    return false;
  }

  log.debug(`Moving ${DIRECTION_NAMES[direction]} to (${next.row}, ${next.col})`);
  tickStatusEffects(state);
  placeAt(state, next);
  processRoomEntry(state, rng);
  return true;
}

/** Start combat with the first unfinished combat encounter of the room. */
export function beginRoomCombat(
  state: ExplorationState,
  rng: RandomSource = defaultRandom,
): CombatState | null {
  if (inCombat(state)) return state.combat;
  const [encounter] = currentRoom(state).pendingCombat();
  if (!encounter) return null;

  state.combat = startCombat(state.character, encounter.monsters, encounter, rng);
  if (encounter.description) state.log.push(encounter.description);
  return state.combat;
}

/** Let monsters act until it is the character's turn or combat ends. */
export function runMonsterTurns(
  combat: CombatState,
  rng: RandomSource = defaultRandom,
): CombatState {
  while (combat.status === CombatStatus.ACTIVE && !isCharacterTurn(combat)) {
    autoAction(combat, rng);
  }
  return combat;
}

/**
 * Apply the outcome of a finished combat. Victory collects loot and
 * `combatXpPerDungeonLevel * levelNum` XP; defeat sends the character back
 * to the entrance at half health; fleeing leaves them where they are.
 */
export function resolveCombat(
  state: ExplorationState,
  rng: RandomSource = defaultRandom,
): CombatResolution | null {
  const combat = state.combat;
  if (!combat || combat.status === CombatStatus.ACTIVE) return null;
  state.combat = null;

  const resolution: CombatResolution = {
    status: combat.status,
    xpGained: 0,
    leveledUp: false,
    loot: [],
  };

  switch (combat.status) {
    case CombatStatus.VICTORY: {
      if (combat.encounter) {
        resolution.loot = combat.encounter.complete(rng);
        takeItems(state, resolution.loot);
      }
      resolution.xpGained = BALANCE.rewards.combatXpPerDungeonLevel * state.dungeon.levelNum;
      state.log.push(`You gained ${resolution.xpGained} XP.`);
      resolution.leveledUp = grantXp(state, resolution.xpGained, rng);
      state.log.push('Combat ended in victory!');
      break;
    }
    case CombatStatus.DEFEAT:
      reviveAtEntrance(state);
      break;
    case CombatStatus.FLED:
      state.log.push('You fled from combat!');
      break;
  }
  return resolution;
}

/** Work the current room's puzzle; unlocked treasure goes to the inventory. */
export function solveRoomPuzzle(
  state: ExplorationState,
  rng: RandomSource = defaultRandom,
): boolean {
  const result = currentRoom(state).solvePuzzle(state.character, rng);
  state.log.push(result.message);
  takeItems(state, result.treasures);
  return result.success;
}

/** Rest at the current room's rest feature. Returns HP restored. */
export function restInRoom(state: ExplorationState): number {
  const healed = currentRoom(state).restAtFeature(state.character);
  if (healed === null) {
    state.log.push('There is nowhere to rest here.');
    return 0;
  }
  state.log.push(`You rest and recover ${healed} HP.`);
  return healed;
}

/** Finish the level from its exit room for `dungeonXpPerDungeonLevel * levelNum` XP. */
export function completeDungeon(
  state: ExplorationState,
  rng: RandomSource = defaultRandom,
): DungeonCompletion {
  const room = currentRoom(state);
  if (state.completed || room !== state.dungeon.exit || inCombat(state)) {
    state.log.push('You must reach the exit first!');
    return { success: false, xpGained: 0, leveledUp: false };
  }

  state.completed = true;
  const xpGained = BALANCE.rewards.dungeonXpPerDungeonLevel * state.dungeon.levelNum;
  state.log.push(`You have completed ${state.dungeon.name}!`);
  state.log.push(`You gained ${xpGained} XP for completing the dungeon!`);
  const leveledUp = grantXp(state, xpGained, rng);
  return { success: true, xpGained, leveledUp };
}
