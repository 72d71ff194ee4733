/**
 * DungeonTables.ts — Text and theme tables loaded from dungeon.json.
 */

import { z } from 'zod';
import dungeonData from '@/data/dungeon.json';

const ThemeSchema = z.object({
  adjectives: z.array(z.string()).min(1),
  rewardPrefix: z.string(),
});

const PuzzleTextSchema = z.object({
  description: z.string(),
  hint: z.string(),
  solution: z.string(),
});

const FeatureTextSchema = z.object({ name: z.string(), description: z.string() });

const DungeonTablesSchema = z.object({
  level: z.object({ title: z.string(), description: z.string() }),
  themes: z.record(z.string(), ThemeSchema),
  fallbackTheme: z.string(),
  fallbackRewardPrefix: z.string(),
  rooms: z.object({
    corridorName: z.string(),
    names: z.record(z.string(), z.string()),
    descriptions: z.record(z.string(), z.string()),
    templates: z.record(z.string(), z.string()),
    corridor: z.string(),
    deadEnd: z.string(),
  }),
  features: z.object({
    puzzle: FeatureTextSchema,
    rest: FeatureTextSchema,
    artifact: FeatureTextSchema,
  }),
  encounters: z.object({
    puzzles: z.object({
      sequence: PuzzleTextSchema,
      pattern: PuzzleTextSchema,
      riddle: PuzzleTextSchema,
    }),
    traps: z.object({
      damage: z.string(),
      status: z.string(),
      teleport: z.string(),
    }),
    trapStatuses: z.array(z.string()).min(1),
  }),
});

export const DUNGEON_TABLES = DungeonTablesSchema.parse(dungeonData);

function lookup(table: Record<string, string>, key: number | string): string | undefined {
  const k = String(key);
  return Object.hasOwn(table, k) ? table[k] : undefined;
}

// ---------------------------------------------------------------------------
// Themes
// ---------------------------------------------------------------------------

function getTheme(theme: string): z.infer<typeof ThemeSchema> | undefined {
  const themes = DUNGEON_TABLES.themes;
  return Object.hasOwn(themes, theme) ? themes[theme] : undefined;
}

/** Adjective pool for a theme; unknown themes use the fallback theme's pool. */
export function getThemeAdjectives(theme: string): readonly string[] {
  const entry = getTheme(theme) ?? getTheme(DUNGEON_TABLES.fallbackTheme);
  if (!entry) {
    throw new Error(`[DungeonTables] Fallback theme "${DUNGEON_TABLES.fallbackTheme}" is missing`);
  }
  return entry.adjectives;
}

export function getRewardPrefix(theme: string): string {
  return getTheme(theme)?.rewardPrefix ?? DUNGEON_TABLES.fallbackRewardPrefix;
}

// ---------------------------------------------------------------------------
// Rooms
// ---------------------------------------------------------------------------

export function getRoomTypeName(roomType: number | null): string {
  if (roomType === null) return DUNGEON_TABLES.rooms.corridorName;
  return lookup(DUNGEON_TABLES.rooms.names, roomType) ?? DUNGEON_TABLES.rooms.corridorName;
}

/** Fixed flavour text for a room type. */
export function getRoomDescription(roomType: number): string | undefined {
  return lookup(DUNGEON_TABLES.rooms.descriptions, roomType);
}

/** Adjective template for a room type, if the type has one. */
export function getRoomTemplate(roomType: number): string | undefined {
  return lookup(DUNGEON_TABLES.rooms.templates, roomType);
}

export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) =>
    Object.hasOwn(values, key) ? values[key] : match,
  );
}
