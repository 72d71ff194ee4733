/**
 * CraftingSystem.ts — The Forge: combine components into equipment.
 *
 * A recipe matches a multiset of component names in any order. The forge
 * roll is 3d6 plus the crafting attribute modifier plus class affinity;
 * the total decides success and quality.
 */

import { z } from 'zod';
import recipesData from '@/data/recipes.json';
import { createLogger } from '@/engine/Logger';
import { defaultRandom, type RandomSource } from '@/engine/Random';
import { roll3d6 } from '@/rpg/Dice';
import { Attribute, getModifier, type AttributeBlock } from '@/rpg/StatSystem';
import { CharacterClassId } from '@/rpg/CharacterClass';
import type { Item } from '@/rpg/Item';
import type { Character } from '@/entities/Character';

const log = createLogger('Forge');

// ---------------------------------------------------------------------------
// Recipes
// ---------------------------------------------------------------------------

const RecipeSchema = z.object({
  name: z.string(),
  type: z.enum(['weapon', 'armor', 'accessory']),
  classAffinity: z.nativeEnum(CharacterClassId),
  components: z.array(z.string()).min(1),
  description: z.string(),
  stats: z.record(z.string(), z.string()),
});

export type Recipe = z.infer<typeof RecipeSchema>;

export const RECIPES: readonly Recipe[] = z
  .object({ recipes: z.array(RecipeSchema) })
  .parse(recipesData).recipes;

/** Order-insensitive match of component names against the recipe list. */
export function findRecipe(
  componentNames: readonly string[],
  recipes: readonly Recipe[] = RECIPES,
): Recipe | null {
  const wanted = [...componentNames].sort().join('\u0000');
  return recipes.find((r) => [...r.components].sort().join('\u0000') === wanted) ?? null;
}

// ---------------------------------------------------------------------------
// Quality
// ---------------------------------------------------------------------------

export type QualityName = 'Excellent' | 'Great' | 'Good' | 'Poor';

export interface QualityTier {
  quality: QualityName;
  /** Substituted for [QUALITY]. */
  value: number;
  /** Die size substituted for [DICE]. */
  dice: number;
}

export const CRAFTING_DIFFICULTY = 10;
const AFFINITY_BONUS = 2;

export function determineQuality(roll: number): QualityTier {
  if (roll >= 18) return { quality: 'Excellent', value: 3, dice: 8 };
  if (roll >= 15) return { quality: 'Great', value: 2, dice: 6 };
  if (roll >= 10) return { quality: 'Good', value: 1, dice: 4 };
  return { quality: 'Poor', value: 0, dice: 4 };
}

/** Fill [QUALITY] and [DICE] in every stat template. */
export function processStats(recipe: Recipe, tier: QualityTier): Record<string, string> {
  const stats: Record<string, string> = {};
  for (const [stat, template] of Object.entries(recipe.stats)) {
    stats[stat] = template
      .replaceAll('[QUALITY]', String(tier.value))
      .replaceAll('[DICE]', String(tier.dice));
  }
  return stats;
}

/**
 * Warriors forge weapons with strength; Wizards forge weapons, and anyone
 * forges accessories, with wisdom; everything else uses dexterity.
 */
export function craftingAttribute(itemType: Recipe['type'], characterClass: CharacterClassId): Attribute {
  if (itemType === 'weapon' && characterClass === CharacterClassId.WARRIOR) return Attribute.STRENGTH;
  if ((itemType === 'weapon' && characterClass === CharacterClassId.WIZARD) || itemType === 'accessory') {
    return Attribute.WISDOM;
  }
  return Attribute.DEXTERITY;
}

// ---------------------------------------------------------------------------
// Crafting
// ---------------------------------------------------------------------------

export interface Crafter {
  characterClass: CharacterClassId;
  attributes: AttributeBlock;
}

export type CraftResult =
  | { success: true; item: Item; recipe: Recipe; total: number }
  | { success: false; reason: string; recipe?: Recipe; total?: number };

export interface CraftOptions {
  /** Forge roll before modifiers; 3d6 from `rng` when omitted. */
  roll?: number;
  rng?: RandomSource;
  recipes?: readonly Recipe[];
}

export function craftItem(
  components: readonly Pick<Item, 'name'>[],
  crafter: Crafter,
  options: CraftOptions = {},
): CraftResult {
  const recipe = findRecipe(
    components.map((c) => c.name),
    options.recipes,
  );
  if (!recipe) {
    return { success: false, reason: "Components don't form a known recipe" };
  }

  const roll = options.roll ?? roll3d6(options.rng ?? defaultRandom);
  const attribute = craftingAttribute(recipe.type, crafter.characterClass);
  const affinity = recipe.classAffinity === crafter.characterClass ? AFFINITY_BONUS : 0;
  const total = roll + getModifier(crafter.attributes, attribute) + affinity;

  if (total < CRAFTING_DIFFICULTY) {
    return { success: false, reason: 'Crafting attempt failed', recipe, total };
  }

  const tier = determineQuality(total);
  return {
    success: true,
    recipe,
    total,
    item: {
      name: recipe.name,
      type: recipe.type,
      description: recipe.description,
      quality: tier.quality,
      stats: processStats(recipe, tier),
    },
  };
}

/**
 * Forge from the character's own inventory. Components are consumed by
 * any attempt on a known recipe, successful or not; an unknown
 * combination leaves the inventory alone.
 */
export function forgeFromInventory(
  character: Character,
  inventoryIndices: readonly number[],
  rng: RandomSource = defaultRandom,
): CraftResult {
  const unique = [...new Set(inventoryIndices)];
  const components: Item[] = [];
  for (const index of unique) {
    const item = character.inventory[index];
    if (!Number.isInteger(index) || !item) {
      return { success: false, reason: 'Select components from your inventory' };
    }
    components.push(item);
  }

  const result = craftItem(components, character, { rng });
  if (!result.recipe) return result;

  // Remove highest index first so earlier indices stay valid.
  for (const index of [...unique].sort((a, b) => b - a)) {
    character.removeItemAt(index);
  }
  if (result.success) {
    character.addItem(result.item);
    log.info(`${character.name} forged a ${result.item.quality} ${result.item.name}`);
  }
  return result;
}
