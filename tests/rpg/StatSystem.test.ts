import { describe, it, expect } from 'vitest';
import {
  Attribute,
  applyDamage,
  applyHealing,
  characterDefense,
  characterMaxHp,
  characterMaxMp,
  getModifier,
  monsterAttack,
  monsterDefense,
  monsterMaxHp,
  rollAttributes,
  type AttributeBlock,
} from '@/rpg/StatSystem';
import { ScriptedRandom, die } from '../helpers/ScriptedRandom';

const ATTRS: AttributeBlock = { strength: 14, dexterity: 12, wisdom: 13 };

describe('derived stats', () => {
  it('computes character pools from attributes', () => {
    expect(characterMaxHp(ATTRS)).toBe(17);
    expect(characterMaxMp(ATTRS)).toBe(16);
    expect(characterDefense(ATTRS)).toBe(13);
  });

  it('computes monster stats from level and attributes', () => {
    const attrs: AttributeBlock = { strength: 12, dexterity: 12, wisdom: 14 };
    expect(monsterMaxHp(2, attrs)).toBe(17);
    expect(monsterAttack(2, attrs)).toBe(8);
    expect(monsterDefense(attrs)).toBe(16);
  });

  it('reads the modifier of one attribute', () => {
    expect(getModifier(ATTRS, Attribute.STRENGTH)).toBe(2);
    expect(getModifier(ATTRS, Attribute.WISDOM)).toBe(1);
  });
});

describe('rollAttributes', () => {
  it('rolls strength, dexterity and wisdom in order', () => {
    const rng = new ScriptedRandom([
      die(6), die(6), die(6), die(1),
      die(3), die(3), die(3), die(3),
      die(2), die(4), die(5), die(6),
    ]);
    expect(rollAttributes(rng)).toEqual({ strength: 18, dexterity: 9, wisdom: 15 });
  });
});

describe('health helpers', () => {
  it('clamps damage at zero and returns what was lost', () => {
    const target = { hp: 5, maxHp: 10 };
    expect(applyDamage(target, 8)).toBe(5);
    expect(target.hp).toBe(0);
  });

  it('ignores negative damage', () => {
    const target = { hp: 5, maxHp: 10 };
    expect(applyDamage(target, -3)).toBe(0);
    expect(target.hp).toBe(5);
  });

  it('clamps healing at max and returns what was restored', () => {
    const target = { hp: 8, maxHp: 10 };
    expect(applyHealing(target, 5)).toBe(2);
    expect(target.hp).toBe(10);
  });
});
