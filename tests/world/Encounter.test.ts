import { describe, it, expect, beforeEach } from 'vitest';
import {
  Encounter,
  EncounterType,
  attemptPuzzle,
  disarmTrap,
  resolveTrap,
} from '@/world/Encounter';
import { Character } from '@/entities/Character';
import { Monster, MonsterType } from '@/entities/Monster';
import { CharacterClassId } from '@/rpg/CharacterClass';
import { SerializationError } from '@/engine/Errors';
import { ScriptedRandom, d6x3, index } from '../helpers/ScriptedRandom';

function makeTrap(trapIndex: number, difficulty: number, extra: number[] = []): Encounter {
  return new Encounter(EncounterType.TRAP, difficulty, new ScriptedRandom([index(trapIndex, 3), ...extra]));
}

describe('Encounter', () => {
  let hero: Character;

  beforeEach(() => {
    // dex 12 -> +1, str 14 -> +2, wis 10 -> +0
    hero = new Character('Hero', CharacterClassId.WARRIOR, 'Test Origin', {
      strength: 14,
      dexterity: 12,
      wisdom: 10,
    });
  });

  // -----------------------------------------------------------------------
  // Construction
  // -----------------------------------------------------------------------

  describe('construction', () => {
    it('rolls for an ambush on combat encounters', () => {
      const ambush = new Encounter(EncounterType.COMBAT, 1, new ScriptedRandom([0.1]));
      const calm = new Encounter(EncounterType.COMBAT, 1, new ScriptedRandom([0.5]));
      expect(ambush.details).toEqual({ type: EncounterType.COMBAT, monsters: [], ambush: true });
      expect(calm.details).toEqual({ type: EncounterType.COMBAT, monsters: [], ambush: false });
    });

    it('builds a damage trap scaled by difficulty', () => {
      const trap = makeTrap(0, 1);
      expect(trap.details).toEqual({
        type: EncounterType.TRAP,
        trapType: 'damage',
        detected: false,
        disarmed: false,
        effect: { type: 'damage', damage: 3, avoidable: true, saveAttribute: 'dexterity', saveDifficulty: 11 },
      });
    });

    it('picks a condition for status traps', () => {
      const trap = makeTrap(1, 3, [index(2, 3)]);
      const details = trap.details;
      expect(details.type === EncounterType.TRAP && details.effect).toEqual({
        type: 'status',
        status: 'weaken',
        duration: 2,
        avoidable: true,
        saveAttribute: 'strength',
        saveDifficulty: 13,
      });
    });

    it('picks a puzzle type', () => {
      const puzzle = new Encounter(EncounterType.PUZZLE, 1, new ScriptedRandom([index(2, 3)]));
      expect(puzzle.details.type === EncounterType.PUZZLE && puzzle.details.puzzleType).toBe('riddle');
    });

    it('only holds monsters in combat encounters', () => {
      const trap = makeTrap(0, 1);
      trap.addMonster(new Monster('Stray', 1, { monsterType: MonsterType.GLITCH, abilities: [], loot: [] }));
      expect(trap.monsters).toEqual([]);
    });
  });

  // -----------------------------------------------------------------------
  // Traps
  // -----------------------------------------------------------------------

  describe('resolveTrap', () => {
    it('hurts on a failed dexterity save', () => {
      const trap = makeTrap(0, 1);
      const outcome = resolveTrap(trap, hero, new ScriptedRandom(d6x3(2, 2, 2)));
      expect(outcome.avoided).toBe(false);
      expect(outcome.damage).toBe(3);
      expect(outcome.message).toBe('A surge of energy hits you for 3 damage!');
      expect(hero.hp).toBe(14);
      expect(trap.completed).toBe(true);
      expect(trap.details.type === EncounterType.TRAP && trap.details.detected).toBe(true);
    });

    it('is avoided when the save meets the difficulty', () => {
      const trap = makeTrap(0, 1);
      const outcome = resolveTrap(trap, hero, new ScriptedRandom(d6x3(4, 4, 2)));
      expect(outcome).toMatchObject({ triggered: true, avoided: true, message: 'You avoid the damage trap!' });
      expect(hero.hp).toBe(17);
    });

    it('adds a status record on a failed strength save', () => {
      const trap = makeTrap(1, 3, [index(0, 3)]);
      const outcome = resolveTrap(trap, hero, new ScriptedRandom(d6x3(1, 1, 1)));
      expect(outcome.message).toBe('You are afflicted with poison for 2 turns!');
      expect(hero.statusEffects).toEqual([{ type: 'poison', duration: 2, source: 'trap' }]);
    });

    it('reports the teleport distance', () => {
      const trap = makeTrap(2, 2);
      const outcome = resolveTrap(trap, hero, new ScriptedRandom(d6x3(1, 1, 1)));
      expect(outcome.message).toBe('A spatial distortion hurls you 2 rooms away!');
      expect(outcome.teleportDistance).toBe(2);
    });

    it('does nothing once sprung', () => {
      const trap = makeTrap(0, 1);
      trap.completed = true;
      const outcome = resolveTrap(trap, hero, new ScriptedRandom([]));
      expect(outcome).toEqual({ triggered: false, avoided: true, check: null, message: 'Nothing happens.' });
    });
  });

  describe('disarmTrap', () => {
    it('disarms on a successful dexterity check', () => {
      const trap = makeTrap(0, 1);
      const outcome = disarmTrap(trap, hero, new ScriptedRandom(d6x3(5, 5, 5)));
      expect(outcome.message).toBe('You disarm the damage trap.');
      expect(trap.details.type === EncounterType.TRAP && trap.details.disarmed).toBe(true);
      expect(trap.completed).toBe(true);
    });

    it('springs the trap on a failure', () => {
      const trap = makeTrap(0, 1);
      const rng = new ScriptedRandom([...d6x3(1, 1, 1), ...d6x3(1, 1, 1)]);
      const outcome = disarmTrap(trap, hero, rng);
      expect(outcome.damage).toBe(3);
      expect(hero.hp).toBe(14);
    });
  });

  // -----------------------------------------------------------------------
  // Puzzles
  // -----------------------------------------------------------------------

  describe('attemptPuzzle', () => {
    function makePuzzle(): Encounter {
      const puzzle = new Encounter(EncounterType.PUZZLE, 1, new ScriptedRandom([index(0, 3)]));
      if (puzzle.details.type === EncounterType.PUZZLE) puzzle.details.hints = ['Count the lights.'];
      return puzzle.addReward({ name: 'Prismatic Data Crystal', type: 'rare_component', value: 15 });
    }

    it('hands out the rewards on success', () => {
      const puzzle = makePuzzle();
      const outcome = attemptPuzzle(puzzle, hero, new ScriptedRandom(d6x3(4, 4, 3)));
      expect(outcome.success).toBe(true);
      expect(outcome.rewards).toEqual([{ name: 'Prismatic Data Crystal', type: 'rare_component', value: 15 }]);
      expect(puzzle.completed).toBe(true);
    });

    it('shows the first hint on failure', () => {
      const puzzle = makePuzzle();
      const outcome = attemptPuzzle(puzzle, hero, new ScriptedRandom(d6x3(1, 1, 1)));
      expect(outcome.message).toBe('The mechanism resists your attempt. Hint: Count the lights.');
      expect(puzzle.completed).toBe(false);
    });
  });

  // -----------------------------------------------------------------------
  // Completion & serialization
  // -----------------------------------------------------------------------

  it('collects monster drops and fixed rewards on completion', () => {
    const encounter = new Encounter(EncounterType.COMBAT, 1, new ScriptedRandom([0.9]));
    encounter.addMonster(
      new Monster('Drone', 1, {
        monsterType: MonsterType.DIGITAL,
        abilities: [],
        loot: [{ type: 'currency', name: 'Digital Essence', amount: 10, dropChance: 1 }],
      }),
    );
    encounter.addReward({ name: 'Cache Key', type: 'item' });

    const items = encounter.complete(new ScriptedRandom([0.5, 0.5]));
    expect(items).toEqual([
      { name: 'Digital Essence', type: 'currency', amount: 10 },
      { name: 'Cache Key', type: 'item' },
    ]);
    expect(encounter.completed).toBe(true);
  });

  it('restores a trap from its saved form', () => {
    const trap = makeTrap(1, 2, [index(1, 3)]).setDescription('A strange field.');
    const copy = Encounter.fromDict(trap.toDict());
    expect(copy.description).toBe('A strange field.');
    expect(copy.details).toEqual(trap.details);
  });

  it('rejects an unknown encounter type', () => {
    expect(() => Encounter.fromDict({ encounter_type: 7 })).toThrow(SerializationError);
  });
});
