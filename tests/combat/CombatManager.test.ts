import { describe, it, expect, beforeEach } from 'vitest';
import {
  CombatStatus,
  autoAction,
  currentIndex,
  getCombatSummary,
  isCharacterTurn,
  processAction,
  startCombat,
  type CombatState,
} from '@/combat/CombatManager';
import { EffectType, isDefending } from '@/combat/StatusEffectSystem';
import { Character } from '@/entities/Character';
import { Monster, MonsterType, type MonsterAbility } from '@/entities/Monster';
import { CharacterClassId } from '@/rpg/CharacterClass';
import { Encounter, EncounterType } from '@/world/Encounter';
import { ScriptedRandom, d6x3, die, index } from '../helpers/ScriptedRandom';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const DRONE_ABILITIES: MonsterAbility[] = [
  { name: 'Data Spike', damageMultiplier: 1.5, target: 'single' },
  { name: 'Virus Spread', effect: EffectType.DAMAGE_OVER_TIME, amount: 1, duration: 3, target: 'single' },
  { name: 'Firewall', effect: EffectType.SHIELD, amount: 3, duration: 2, target: 'self' },
  { name: 'Data Drain', damage: 2, healPercent: 50, target: 'single' },
  { name: 'Memory Leak', effect: EffectType.REDUCE_MP, amount: 2, duration: 1, target: 'single' },
];

/** Level 1, all attributes 10: 13 HP, defense 15. */
function makeDrone(name: string = 'Test Drone'): Monster {
  return new Monster(name, 1, {
    monsterType: MonsterType.DIGITAL,
    attributes: { strength: 10, dexterity: 10, wisdom: 10 },
    abilities: DRONE_ABILITIES,
    loot: [],
  });
}

/** 17 HP, 15 MP, defense 12, strength +2. */
function makeHero(): Character {
  return new Character('Hero', CharacterClassId.WARRIOR, 'Test Origin', {
    strength: 14,
    dexterity: 10,
    wisdom: 10,
  });
}

/** Character rolls 18 for initiative, every monster rolls 3. */
function begin(
  character: Character,
  monsters: Monster[],
  encounter: Encounter | null = null,
): CombatState {
  const rolls = [...d6x3(6, 6, 6), ...monsters.flatMap(() => d6x3(1, 1, 1))];
  return startCombat(character, monsters, encounter, new ScriptedRandom(rolls));
}

function script(...values: (number | number[])[]): ScriptedRandom {
  return new ScriptedRandom(values.flat());
}

describe('CombatManager', () => {
  let hero: Character;
  let drone: Monster;
  let state: CombatState;

  beforeEach(() => {
    hero = makeHero();
    drone = makeDrone();
    state = begin(hero, [drone]);
  });

  // -------------------------------------------------------------------------
  // Setup
  // -------------------------------------------------------------------------

  describe('startCombat', () => {
    it('orders participants by initiative', () => {
      expect(state.initiativeOrder).toEqual([
        { participant: 0, roll: 18 },
        { participant: 1, roll: 3 },
      ]);
      expect(state.round).toBe(1);
      expect(state.status).toBe(CombatStatus.ACTIVE);
      expect(state.log).toEqual(['Combat begins!']);
      expect(isCharacterTurn(state)).toBe(true);
    });

    it('leaves defeated monsters out', () => {
      const fallen = makeDrone('Fallen Drone');
      fallen.hp = 0;
      const s = startCombat(hero, [drone, fallen], null, script(d6x3(6, 6, 6), d6x3(1, 1, 1)));
      expect(s.participants.map((p) => p.entity.name)).toEqual(['Hero', 'Test Drone']);
    });

    it('reports a defeat when the character starts at 0 HP', () => {
      hero.hp = 0;
      const s = begin(hero, [drone]);
      expect(s.status).toBe(CombatStatus.DEFEAT);
      expect(s.log).toEqual(['Combat begins!', 'You have been defeated!']);
    });

    it('sends the character to the back of the order on an ambush', () => {
      const encounter = new Encounter(EncounterType.COMBAT, 1, script(0.1));
      const s = begin(hero, [drone], encounter);
      expect(s.initiativeOrder.map((e) => e.participant)).toEqual([1, 0]);
      expect(s.log).toEqual(['Combat begins!', 'Ambush! The enemies strike first.']);
      expect(isCharacterTurn(s)).toBe(false);
    });
  });

  // -------------------------------------------------------------------------
  // Attacks
  // -------------------------------------------------------------------------

  describe('attack', () => {
    it('hits when the roll meets defense and passes the turn', () => {
      processAction(state, 'attack', { targetIndex: 1 }, script(d6x3(5, 5, 5), die(4)));
      expect(drone.hp).toBe(7);
      expect(state.log).toEqual([
        'Combat begins!',
        'Hero attacks Test Drone.',
        'Attack roll: 17 vs Defense: 15',
        'Hit! Test Drone takes 6 damage.',
        "Test Drone's turn.",
      ]);
      expect(currentIndex(state)).toBe(1);
    });

    it('misses below defense', () => {
      processAction(state, 'attack', { targetIndex: 1 }, script(d6x3(2, 2, 2)));
      expect(state.log.slice(1, 4)).toEqual([
        'Hero attacks Test Drone.',
        'Attack roll: 8 vs Defense: 15',
        'Miss! Test Drone avoids the attack.',
      ]);
      expect(drone.hp).toBe(13);
    });

    it('ends in victory when the last monster falls', () => {
      const encounter = new Encounter(EncounterType.COMBAT, 1, script(0.9));
      encounter.addMonster(drone);
      const s = begin(hero, [drone], encounter);
      drone.hp = 3;

      processAction(s, 'attack', { targetIndex: 1 }, script(d6x3(5, 5, 5), die(1)));
      expect(s.status).toBe(CombatStatus.VICTORY);
      expect(s.log.slice(-3)).toEqual([
        'Hit! Test Drone takes 3 damage.',
        'Test Drone is defeated!',
        'Victory! All enemies have been defeated!',
      ]);
      expect(encounter.completed).toBe(true);
    });

    it('ends in defeat when the character falls', () => {
      state.currentTurn = 1;
      hero.hp = 1;
      processAction(state, 'attack', { targetIndex: 0 }, script(d6x3(6, 6, 6), die(1)));
      expect(state.status).toBe(CombatStatus.DEFEAT);
      expect(state.log.slice(-2)).toEqual(['Hero is defeated!', 'You have been defeated!']);
    });

    it('logs a missing target and still passes the turn', () => {
      processAction(state, 'attack', { targetIndex: 5 }, script());
      expect(state.log.slice(1)).toEqual(['Hero attacks but has no target!', "Test Drone's turn."]);
    });

    it('skips defeated participants when passing the turn', () => {
      const a = makeDrone('Drone A');
      const b = makeDrone('Drone B');
      const s = begin(hero, [a, b]);
      a.hp = 0;
      processAction(s, 'attack', { targetIndex: 2 }, script(d6x3(1, 1, 1)));
      expect(currentIndex(s)).toBe(2);
      expect(s.log.at(-1)).toBe("Drone B's turn.");
    });
  });

  // -------------------------------------------------------------------------
  // Defend
  // -------------------------------------------------------------------------

  describe('defend', () => {
    it('raises defense until the defender acts again', () => {
      processAction(state, 'defend');
      expect(isDefending(state.activeEffects, 0)).toBe(true);

      processAction(state, 'attack', { targetIndex: 0 }, script(d6x3(4, 4, 4)));
      expect(state.log.slice(-6)).toEqual([
        'Test Drone attacks Hero.',
        'Attack roll: 12 vs Defense: 14',
        'Miss! Hero avoids the attack.',
        'Round 2 begins!',
        "Hero's turn.",
        'Hero is no longer defending.',
      ]);
      expect(state.round).toBe(2);
      expect(state.activeEffects).toEqual([]);
    });

    it('reduces damage but never below 1', () => {
      processAction(state, 'defend');
      processAction(state, 'attack', { targetIndex: 0 }, script(d6x3(6, 6, 5), die(1)));
      expect(state.log).toContain('Hit! Hero takes 1 damage.');
      expect(hero.hp).toBe(16);
    });
  });

  // -------------------------------------------------------------------------
  // Monster abilities
  // -------------------------------------------------------------------------

  describe('monster abilities', () => {
    beforeEach(() => {
      state.currentTurn = 1;
    });

    it('multiplies a d6 for damage abilities', () => {
      processAction(state, 'ability', { targetIndex: 0, abilityIndex: 0 }, script(die(4)));
      expect(state.log.slice(1, 3)).toEqual(['Test Drone uses Data Spike!', 'Hero takes 6 damage!']);
      expect(hero.hp).toBe(11);
    });

    it('ticks damage over time in the same action', () => {
      processAction(state, 'ability', { targetIndex: 0, abilityIndex: 1 }, script());
      expect(state.log.slice(1)).toEqual([
        'Test Drone uses Virus Spread!',
        'Hero is affected by Virus Spread!',
        'Hero takes 1 damage from Virus Spread!',
        'Round 2 begins!',
        "Hero's turn.",
      ]);
      expect(hero.hp).toBe(16);
      expect(state.activeEffects[0]).toMatchObject({ type: EffectType.DAMAGE_OVER_TIME, target: 0, duration: 2 });
    });

    it('applies self effects to the user', () => {
      processAction(state, 'ability', { targetIndex: 0, abilityIndex: 2 }, script());
      expect(state.log[2]).toBe('Test Drone is affected by Firewall!');
      expect(state.activeEffects).toEqual([
        { type: EffectType.SHIELD, source: 1, target: 1, duration: 1, amount: 3, description: 'Firewall' },
      ]);
    });

    it('heals the user for a share of flat damage', () => {
      drone.hp = 10;
      processAction(state, 'ability', { targetIndex: 0, abilityIndex: 3 }, script());
      expect(state.log.slice(1, 4)).toEqual([
        'Test Drone uses Data Drain!',
        'Hero takes 2 damage!',
        'Test Drone recovers 1 HP!',
      ]);
      expect(hero.hp).toBe(15);
      expect(drone.hp).toBe(11);
    });

    it('drains MP and expires the effect', () => {
      processAction(state, 'ability', { targetIndex: 0, abilityIndex: 4 }, script());
      expect(state.log.slice(2, 5)).toEqual([
        'Hero is affected by Memory Leak!',
        'Hero loses 2 MP from Memory Leak!',
        'The effect Memory Leak has worn off.',
      ]);
      expect(hero.mp).toBe(13);
      expect(state.activeEffects).toEqual([]);
    });

    it('rejects an unknown ability index', () => {
      processAction(state, 'ability', { targetIndex: 0, abilityIndex: 9 }, script());
      expect(state.log[1]).toBe('Test Drone tries to use an invalid ability!');
      expect(isCharacterTurn(state)).toBe(true);
    });

    it('keeps monsters from using items or fleeing', () => {
      processAction(state, 'item', { itemIndex: 0 }, script());
      expect(state.log[1]).toBe("Test Drone can't use items!");

      state.currentTurn = 1;
      processAction(state, 'flee', {}, script());
      expect(state.log).toContain("Test Drone can't flee!");
    });
  });

  // -------------------------------------------------------------------------
  // Character skills
  // -------------------------------------------------------------------------

  describe('character skills', () => {
    it('uses a damage skill on the target', () => {
      processAction(state, 'ability', { targetIndex: 1, abilityIndex: 0 }, script(die(3, 8)));
      expect(state.log.slice(1, 3)).toEqual(['Hero uses Power Attack!', 'Test Drone takes 12 damage!']);
      expect(drone.hp).toBe(1);
    });

    it('needs a living target for a single-target damage skill', () => {
      processAction(state, 'ability', { abilityIndex: 0 }, script());
      expect(state.log.slice(1, 3)).toEqual(['Hero uses Power Attack!', 'No target for the ability!']);
    });

    it('turns a buff skill into an effect on the user', () => {
      processAction(state, 'ability', { abilityIndex: 1 }, script());
      expect(state.log[2]).toBe('Hero is affected by Defend!');
      expect(isDefending(state.activeEffects, 0)).toBe(true);
    });

    it('logs a failure without an ability index', () => {
      processAction(state, 'ability', { targetIndex: 1 }, script());
      expect(state.log[1]).toBe('Hero tries to use an ability but fails!');
    });

    it('heals and spends MP', () => {
      const mage = new Character('Mage', CharacterClassId.WHITE_MAGE, 'Test Origin', {
        strength: 10,
        dexterity: 10,
        wisdom: 10,
      });
      const s = begin(mage, [makeDrone()]);
      mage.hp = 5;

      processAction(s, 'ability', { abilityIndex: 0 }, script(die(4)));
      expect(s.log.slice(1, 3)).toEqual(['Mage uses Heal!', 'Mage is healed for 5 HP!']);
      expect(mage.hp).toBe(10);
      expect(mage.mp).toBe(12);
    });

    it('refuses a skill without enough MP', () => {
      const mage = new Character('Mage', CharacterClassId.WHITE_MAGE, 'Test Origin', {
        strength: 10,
        dexterity: 10,
        wisdom: 10,
      });
      const s = begin(mage, [makeDrone()]);
      mage.mp = 1;

      processAction(s, 'ability', { abilityIndex: 0 }, script());
      expect(s.log.slice(1, 3)).toEqual(['Mage uses Heal!', 'Not enough MP']);
      expect(mage.mp).toBe(1);
    });
  });

  // -------------------------------------------------------------------------
  // Items
  // -------------------------------------------------------------------------

  describe('items', () => {
    it('heals with a health potion and removes it', () => {
      hero.addItem({ name: 'Health Chip', type: 'consumable', subtype: 'health_potion', amount: 5 });
      hero.hp = 10;
      processAction(state, 'item', { itemIndex: 2 }, script());
      expect(state.log.slice(1, 3)).toEqual(['Hero uses Health Chip!', 'Hero is healed for 5 HP!']);
      expect(hero.hp).toBe(15);
      expect(hero.inventory.map((i) => i.name)).toEqual(['Iron Sword', 'Leather Armor']);
    });

    it('restores MP with a mana potion', () => {
      hero.addItem({ name: 'Mana Fragment', type: 'consumable', subtype: 'mana_potion', amount: 4 });
      hero.mp = 5;
      processAction(state, 'item', { itemIndex: 2 }, script());
      expect(state.log[2]).toBe('Hero restores 4 MP!');
      expect(hero.mp).toBe(9);
    });

    it('adds a buff effect', () => {
      hero.addItem({
        name: 'Combat Algorithm',
        type: 'consumable',
        subtype: 'buff_item',
        effect: EffectType.INCREASE_ATTACK,
        amount: 2,
        duration: 3,
      });
      processAction(state, 'item', { itemIndex: 2 }, script());
      expect(state.log[2]).toBe('Hero is buffed by Combat Algorithm!');
      expect(state.activeEffects).toEqual([
        {
          type: EffectType.INCREASE_ATTACK,
          source: 0,
          target: 0,
          duration: 2,
          amount: 2,
          description: 'Combat Algorithm',
        },
      ]);
    });

    it('rejects an empty slot', () => {
      processAction(state, 'item', { itemIndex: 9 }, script());
      expect(state.log[1]).toBe('Hero tries to use an invalid item!');
      expect(hero.inventory).toHaveLength(2);
    });
  });

  // -------------------------------------------------------------------------
  // Flee
  // -------------------------------------------------------------------------

  describe('flee', () => {
    it('ends combat on success without passing the turn', () => {
      processAction(state, 'flee', {}, script(d6x3(4, 4, 3)));
      expect(state.status).toBe(CombatStatus.FLED);
      expect(state.log.slice(1)).toEqual(['Hero attempts to flee!', 'Hero successfully escapes!']);
      expect(state.currentTurn).toBe(0);
    });

    it('passes the turn on failure', () => {
      processAction(state, 'flee', {}, script(d6x3(3, 3, 4)));
      expect(state.status).toBe(CombatStatus.ACTIVE);
      expect(state.log.slice(1)).toEqual(['Hero attempts to flee!', 'Hero fails to escape!', "Test Drone's turn."]);
    });

    it('gets harder with every extra enemy', () => {
      // Two monsters: difficulty 12.
      const pair = () => begin(hero, [makeDrone('Drone A'), makeDrone('Drone B')]);

      const escaped = pair();
      processAction(escaped, 'flee', {}, script(d6x3(4, 4, 4)));
      expect(escaped.status).toBe(CombatStatus.FLED);

      const caught = pair();
      processAction(caught, 'flee', {}, script(d6x3(4, 4, 3)));
      expect(caught.status).toBe(CombatStatus.ACTIVE);
      expect(caught.log.slice(1)).toEqual(['Hero attempts to flee!', 'Hero fails to escape!', "Drone A's turn."]);
    });

    it('leaves a finished combat untouched', () => {
      processAction(state, 'flee', {}, script(d6x3(6, 6, 6)));
      const length = state.log.length;
      processAction(state, 'attack', { targetIndex: 1 }, script());
      expect(state.log).toHaveLength(length);
    });
  });

  // -------------------------------------------------------------------------
  // Monster turns
  // -------------------------------------------------------------------------

  describe('autoAction', () => {
    it('does nothing on the character turn', () => {
      const rng = script(0.5);
      autoAction(state, rng);
      expect(state.log).toEqual(['Combat begins!']);
      expect(rng.remaining).toBe(1);
    });

    it('attacks the character on a low roll', () => {
      state.currentTurn = 1;
      autoAction(state, script(0.5, d6x3(6, 6, 6), die(2)));
      expect(state.log.slice(1, 4)).toEqual([
        'Test Drone attacks Hero.',
        'Attack roll: 18 vs Defense: 12',
        'Hit! Hero takes 2 damage.',
      ]);
      expect(hero.hp).toBe(15);
    });

    it('ends in defeat when no character is left to target', () => {
      state.currentTurn = 1;
      hero.hp = 0;
      const rng = script();
      autoAction(state, rng);
      expect(state.status).toBe(CombatStatus.DEFEAT);
      expect(state.log).toEqual(['Combat begins!', 'Test Drone has no valid target!', 'You have been defeated!']);
      expect(rng.draws).toBe(0);
    });

    it('uses an ability on a high roll', () => {
      state.currentTurn = 1;
      autoAction(state, script(0.8, index(0, 5), die(4)));
      expect(state.log.slice(1, 3)).toEqual(['Test Drone uses Data Spike!', 'Hero takes 6 damage!']);
    });
  });

  // -------------------------------------------------------------------------
  // Summary
  // -------------------------------------------------------------------------

  it('summarises the fight for display', () => {
    processAction(state, 'attack', { targetIndex: 1 }, script(d6x3(5, 5, 5), die(4)));
    expect(getCombatSummary(state)).toEqual({
      round: 1,
      currentTurn: 'Test Drone',
      isPlayerTurn: false,
      character: { name: 'Hero', hp: 17, maxHp: 17, mp: 15, maxMp: 15 },
      monsters: [{ name: 'Test Drone', hp: 7, maxHp: 13 }],
      log: [
        'Combat begins!',
        'Hero attacks Test Drone.',
        'Attack roll: 17 vs Defense: 15',
        'Hit! Test Drone takes 6 damage.',
        "Test Drone's turn.",
      ],
      status: CombatStatus.ACTIVE,
    });
  });
});
