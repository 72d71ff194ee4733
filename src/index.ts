// Engine
export * from './engine/Random';
export * from './engine/Config';
export * from './engine/Logger';
export * from './engine/Errors';
export * from './engine/Validation';
export { BALANCE, type Balance } from './engine/Balance';

// RPG rules
export * from './rpg/Dice';
export * from './rpg/StatSystem';
export * from './rpg/Item';
export * from './rpg/CharacterClass';
export * from './rpg/SkillSystem';
export * from './rpg/LevelingSystem';
export * from './rpg/LootTable';
export * from './rpg/CraftingSystem';

// Entities
export * from './entities/Character';
export * from './entities/Monster';
export * from './entities/MonsterGenerator';

// World
export * from './world/Room';
export * from './world/Encounter';
export * from './world/DungeonLevel';
export * from './world/EncounterGenerator';
export * from './world/DungeonGenerator';
export * from './world/ExplorationSystem';
export { getThemeAdjectives, getRewardPrefix, getRoomTypeName } from './world/DungeonTables';

// Combat
export * from './combat/StatusEffectSystem';
export * from './combat/EnemyAI';
export * from './combat/CombatManager';
