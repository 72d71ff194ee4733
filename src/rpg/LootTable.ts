/**
 * LootTable.ts — Monster loot tables and drop rolls.
 *
 * A table is built once when a monster is created (which candidate drops
 * it carries); `rollLoot` decides what actually falls when it is defeated.
 * Drop tuning lives in monsters.json.
 */

import { z } from 'zod';
import monstersData from '@/data/monsters.json';
import { BALANCE } from '@/engine/Balance';
import { capitalize } from '@/engine/Text';
import type { RandomSource } from '@/engine/Random';
import { COMPONENT_TYPES, CONSUMABLE_SUBTYPES, type LootEntry } from '@/rpg/Item';

// ---------------------------------------------------------------------------
// Internal: load drop tuning from monsters.json
// ---------------------------------------------------------------------------

const LootConfigSchema = z.object({
  component: z.object({
    baseChance: z.number(),
    chancePerLevel: z.number(),
    baseValue: z.number(),
    dropChance: z.number(),
  }),
  consumable: z.object({
    baseChance: z.number(),
    chancePerLevel: z.number(),
    options: z
      .array(
        z.object({
          subtype: z.enum(CONSUMABLE_SUBTYPES),
          name: z.string(),
          effect: z.string(),
          baseAmount: z.number(),
          amountPerLevel: z.number(),
          duration: z.number().optional(),
          dropChance: z.number(),
        }),
      )
      .min(1),
  }),
  currency: z.object({
    name: z.string(),
    baseAmount: z.number(),
    amountPerLevel: z.number(),
  }),
  bossDrop: z.object({
    nameSuffix: z.string(),
    valuePerLevel: z.number(),
  }),
});

const LOOT = LootConfigSchema.parse(monstersData.loot);
const VARIANCE = BALANCE.loot.variance; // 0.2

// ---------------------------------------------------------------------------
// Table generation
// ---------------------------------------------------------------------------

/**
 * Candidate drops for a monster: maybe a crafting component, maybe a
 * consumable, always currency.
 */
export function generateLootTable(
  level: number,
  typeName: string,
  rng: RandomSource,
): LootEntry[] {
  const table: LootEntry[] = [];

  const component = LOOT.component;
  if (rng.next() < component.baseChance + level * component.chancePerLevel) {
    const componentType = rng.pick(COMPONENT_TYPES);
    table.push({
      type: 'component',
      componentType,
      name: `${typeName} ${capitalize(componentType)}`,
      value: component.baseValue + level,
      dropChance: component.dropChance,
    });
  }

  const consumable = LOOT.consumable;
  if (rng.next() < consumable.baseChance + level * consumable.chancePerLevel) {
    const option = rng.pick(consumable.options);
    const entry: LootEntry = {
      type: 'consumable',
      subtype: option.subtype,
      name: option.name,
      effect: option.effect,
      amount: option.baseAmount + option.amountPerLevel * level,
      dropChance: option.dropChance,
    };
    if (option.duration !== undefined) entry.duration = option.duration;
    table.push(entry);
  }

  table.push({
    type: 'currency',
    name: LOOT.currency.name,
    amount: LOOT.currency.baseAmount + LOOT.currency.amountPerLevel * level,
    dropChance: 1.0,
  });

  return table;
}

/** Guaranteed rare drop carried by bosses. */
export function createBossDrop(level: number, theme: string): LootEntry {
  return {
    type: 'rare_item',
    name: `${capitalize(theme)} ${LOOT.bossDrop.nameSuffix}`,
    value: level * LOOT.bossDrop.valuePerLevel,
    dropChance: 1.0,
  };
}

// ---------------------------------------------------------------------------
// Rolling
// ---------------------------------------------------------------------------

/**
 * Roll each entry against its own drop chance. Amounts vary by up to
 * +/-20% (truncated, minimum 1).
 */
export function rollLoot(table: readonly LootEntry[], rng: RandomSource): LootEntry[] {
  const dropped: LootEntry[] = [];
  for (const entry of table) {
    if (rng.next() > entry.dropChance) continue;
    const copy: LootEntry = { ...entry };
    if (copy.amount !== undefined) {
      const variation = copy.amount * VARIANCE;
      copy.amount = Math.max(1, Math.trunc(copy.amount + rng.nextFloat(-variation, variation)));
    }
    dropped.push(copy);
  }
  return dropped;
}
