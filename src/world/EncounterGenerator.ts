/**
 * EncounterGenerator.ts — Picks the encounter that goes with a room type.
 *
 * Combat and boss rooms always get monsters, puzzle rooms a puzzle with a
 * themed reward, treasure rooms sometimes a guardian trap. Every other
 * room type gets nothing.
 */

import { BALANCE } from '@/engine/Balance';
import { createLogger } from '@/engine/Logger';
import { defaultRandom, type RandomSource } from '@/engine/Random';
import type { Item } from '@/rpg/Item';
import { generateBoss, generateMonster } from '@/entities/MonsterGenerator';
import { DUNGEON_TABLES, getRewardPrefix } from '@/world/DungeonTables';
import { Encounter, EncounterType } from '@/world/Encounter';
import { RoomType } from '@/world/Room';

const log = createLogger('EncounterGenerator');

const BOSS_LEVEL_BONUS = 2;

function combatEncounter(difficulty: number, rng: RandomSource): Encounter {
  const encounter = new Encounter(EncounterType.COMBAT, difficulty, rng);
  const count = Math.min(1 + Math.floor(difficulty / 2), BALANCE.encounters.maxCombatMonsters);
  for (let i = 0; i < count; i++) {
    encounter.addMonster(generateMonster(difficulty, undefined, rng));
  }

  const [first] = encounter.monsters;
  return encounter.setDescription(
    count === 1
      ? `A ${first.name} guards this area.`
      : `A group of ${count} hostile entities detected.`,
  );
}

function bossEncounter(difficulty: number, theme: string, rng: RandomSource): Encounter {
  const encounter = new Encounter(EncounterType.COMBAT, difficulty + BOSS_LEVEL_BONUS, rng);
  const boss = generateBoss(difficulty, theme, rng);
  encounter.addMonster(boss);

  if (rng.chance(BALANCE.encounters.bossMinionChance)) {
    const minions = rng.nextInt(1, 2);
    const minionLevel = Math.max(1, difficulty - 1);
    for (let i = 0; i < minions; i++) {
      encounter.addMonster(generateMonster(minionLevel, undefined, rng));
    }
  }

  return encounter.setDescription(`The powerful ${boss.name} awaits, radiating dangerous energy.`);
}

function puzzleEncounter(difficulty: number, theme: string, rng: RandomSource): Encounter {
  const encounter = new Encounter(EncounterType.PUZZLE, difficulty, rng);
  const details = encounter.details;
  if (details.type !== EncounterType.PUZZLE) return encounter;

  const text = DUNGEON_TABLES.encounters.puzzles[details.puzzleType];
  const reward: Item = {
    name: `${getRewardPrefix(theme)} Data Crystal`,
    type: 'rare_component',
    value: 10 + difficulty * 5,
  };

  details.hints = [text.hint];
  details.solution = text.solution;
  details.reward = { ...reward };
  encounter.addReward(reward);
  return encounter.setDescription(text.description);
}

function trapEncounter(difficulty: number, rng: RandomSource): Encounter | null {
  if (!rng.chance(BALANCE.encounters.trapChance)) return null;

  const encounter = new Encounter(EncounterType.TRAP, difficulty, rng);
  const details = encounter.details;
  if (details.type === EncounterType.TRAP) {
    encounter.setDescription(DUNGEON_TABLES.encounters.traps[details.trapType]);
  }
  return encounter;
}

/**
 * Encounter for a room, or null when the room type has none (or a
 * treasure room's trap roll fails). Fractional difficulties are floored.
 */
export function generateEncounter(
  roomType: RoomType | null,
  difficulty: number = 1,
  theme: string = 'neon',
  rng: RandomSource = defaultRandom,
): Encounter | null {
  const d = Math.floor(difficulty);
  switch (roomType) {
    case RoomType.COMBAT:
      return combatEncounter(d, rng);
    case RoomType.BOSS:
      return bossEncounter(d, theme, rng);
    case RoomType.PUZZLE:
      return puzzleEncounter(d, theme, rng);
    case RoomType.TREASURE:
      return trapEncounter(d, rng);
    default:
      log.debug(`No encounter for room type ${String(roomType)}`);
      return null;
  }
}
