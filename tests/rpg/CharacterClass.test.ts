import { describe, it, expect } from 'vitest';
import {
  CharacterClassId,
  getAllClasses,
  getStartingKit,
  isCharacterClassId,
} from '@/rpg/CharacterClass';

describe('CharacterClass', () => {
  it('loads every class from data in file order', () => {
    const classes = getAllClasses();
    expect(classes.map((c) => c.id)).toEqual([
      CharacterClassId.WARRIOR,
      CharacterClassId.WIZARD,
      CharacterClassId.WHITE_MAGE,
      CharacterClassId.WANDERER,
    ]);
    for (const def of classes) {
      expect(def.startingKit).toHaveLength(2);
      expect(def.startingSkills).toHaveLength(2);
    }
  });

  it('recognises class names exactly', () => {
    expect(isCharacterClassId('White Mage')).toBe(true);
    expect(isCharacterClassId('warrior')).toBe(false);
    expect(isCharacterClassId('Paladin')).toBe(false);
  });

  it('hands out copies of the starting kit', () => {
    const kit = getStartingKit(CharacterClassId.WARRIOR);
    expect(kit.map((i) => i.name)).toEqual(['Iron Sword', 'Leather Armor']);
    kit[0].name = 'Bent Sword';
    expect(getStartingKit(CharacterClassId.WARRIOR)[0].name).toBe('Iron Sword');
  });
});
