/**
 * Item.ts — Item records carried in inventories, loot tables and rooms.
 *
 * Items are plain records. The in-memory form is camelCase; the persisted
 * form (ItemData) keeps the snake_case keys of saved games.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export enum EquipSlot {
  WEAPON = 'weapon',
  ARMOR = 'armor',
  ACCESSORY = 'accessory',
}

export const EQUIP_SLOTS: readonly EquipSlot[] = [
  EquipSlot.WEAPON,
  EquipSlot.ARMOR,
  EquipSlot.ACCESSORY,
];

export const ITEM_TYPES = [
  'weapon',
  'armor',
  'accessory',
  'consumable',
  'component',
  'rare_component',
  'rare_item',
  'currency',
  'item',
] as const;
export type ItemType = (typeof ITEM_TYPES)[number];

export const CONSUMABLE_SUBTYPES = ['health_potion', 'mana_potion', 'buff_item'] as const;
export type ConsumableSubtype = (typeof CONSUMABLE_SUBTYPES)[number];

export const COMPONENT_TYPES = ['metal', 'elemental', 'catalyst', 'binding', 'rune'] as const;
export type ComponentType = (typeof COMPONENT_TYPES)[number];

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface Item {
  name: string;
  type: ItemType;
  description?: string;
  /** Dice notation, e.g. "1d8". */
  damage?: string;
  defense?: number;
  effect?: string;
  subtype?: ConsumableSubtype;
  amount?: number;
  duration?: number;
  value?: number;
  componentType?: ComponentType;
  quality?: string;
  stats?: Record<string, string>;
}

export interface LootEntry extends Item {
  dropChance: number;
}

export interface Treasure extends Item {
  found: boolean;
  requiresPuzzle?: boolean;
}

export function isEquipSlot(type: string): type is EquipSlot {
  return EQUIP_SLOTS.some((slot) => slot === type);
}

// ---------------------------------------------------------------------------
// Persisted form
// ---------------------------------------------------------------------------

export const ItemDataSchema = z.object({
  name: z.string(),
  type: z.enum(ITEM_TYPES),
  description: z.string().optional(),
  damage: z.string().optional(),
  defense: z.number().optional(),
  effect: z.string().optional(),
  subtype: z.enum(CONSUMABLE_SUBTYPES).optional(),
  amount: z.number().optional(),
  duration: z.number().optional(),
  value: z.number().optional(),
  component_type: z.enum(COMPONENT_TYPES).optional(),
  quality: z.string().optional(),
  stats: z.record(z.string(), z.string()).optional(),
});

export const LootEntryDataSchema = ItemDataSchema.extend({
  drop_chance: z.number().min(0).max(1),
});

export const TreasureDataSchema = ItemDataSchema.extend({
  found: z.boolean(),
  requires_puzzle: z.boolean().optional(),
});

export type ItemData = z.infer<typeof ItemDataSchema>;
export type LootEntryData = z.infer<typeof LootEntryDataSchema>;
export type TreasureData = z.infer<typeof TreasureDataSchema>;

export function itemToData(item: Item): ItemData {
  return {
    name: item.name,
    type: item.type,
    description: item.description,
    damage: item.damage,
    defense: item.defense,
    effect: item.effect,
    subtype: item.subtype,
    amount: item.amount,
    duration: item.duration,
    value: item.value,
    component_type: item.componentType,
    quality: item.quality,
    stats: item.stats ? { ...item.stats } : undefined,
  };
}

export function itemFromData(data: ItemData): Item {
  return {
    name: data.name,
    type: data.type,
    description: data.description,
    damage: data.damage,
    defense: data.defense,
    effect: data.effect,
    subtype: data.subtype,
    amount: data.amount,
    duration: data.duration,
    value: data.value,
    componentType: data.component_type,
    quality: data.quality,
    stats: data.stats ? { ...data.stats } : undefined,
  };
}

export function lootEntryToData(entry: LootEntry): LootEntryData {
  return { ...itemToData(entry), drop_chance: entry.dropChance };
}

export function lootEntryFromData(data: LootEntryData): LootEntry {
  return { ...itemFromData(data), dropChance: data.drop_chance };
}

export function treasureToData(treasure: Treasure): TreasureData {
  const data: TreasureData = { ...itemToData(treasure), found: treasure.found };
  if (treasure.requiresPuzzle !== undefined) data.requires_puzzle = treasure.requiresPuzzle;
  return data;
}

export function treasureFromData(data: TreasureData): Treasure {
  const treasure: Treasure = { ...itemFromData(data), found: data.found };
  if (data.requires_puzzle !== undefined) treasure.requiresPuzzle = data.requires_puzzle;
  return treasure;
}

/** Strip loot/treasure bookkeeping, leaving the item that goes in a bag. */
export function toInventoryItem(source: Item): Item {
  return itemFromData(itemToData(source));
}
