import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DungeonLevel } from '@/world/DungeonLevel';
import { Direction, RoomType } from '@/world/Room';
import { OutOfBoundsError, SerializationError } from '@/engine/Errors';

describe('DungeonLevel', () => {
  let dungeon: DungeonLevel;

  beforeEach(() => {
    dungeon = new DungeonLevel(3, 4, 2, 'cyber');
  });

  it('names the level after its number', () => {
    expect(dungeon.name).toBe('Level 2: The Digital Deep');
    expect(dungeon.allRooms()).toHaveLength(12);
  });

  it('addresses rooms by row and column', () => {
    const room = dungeon.at(2, 3);
    expect([room.row, room.col]).toEqual([2, 3]);
    expect(() => dungeon.at(3, 0)).toThrow(OutOfBoundsError);
    expect(() => dungeon.at(0, -1)).toThrow(OutOfBoundsError);
  });

  it('lists rooms in row-major order', () => {
    const positions = dungeon.allRooms().slice(0, 5).map((r) => [r.row, r.col]);
    expect(positions).toEqual([[0, 0], [0, 1], [0, 2], [0, 3], [1, 0]]);
  });

  describe('links', () => {
    it('sets both sides of a link', () => {
      expect(dungeon.linkRooms(dungeon.at(0, 0), Direction.EAST)).toBe(true);
      expect(dungeon.at(0, 0).linked(Direction.EAST)).toBe(true);
      expect(dungeon.at(0, 1).linked(Direction.WEST)).toBe(true);
    });

    it('refuses links that leave the grid', () => {
      const corner = dungeon.at(0, 0);
      expect(dungeon.linkRooms(corner, Direction.NORTH)).toBe(false);
      expect(dungeon.linkRooms(corner, Direction.WEST)).toBe(false);
      expect(corner.links).toBe(0);
    });

    it('clears both sides when unlinking', () => {
      dungeon.linkRooms(dungeon.at(1, 1), Direction.SOUTH);
      expect(dungeon.unlinkRooms(dungeon.at(1, 1), Direction.SOUTH)).toBe(true);
      expect(dungeon.at(1, 1).links).toBe(0);
      expect(dungeon.at(2, 1).links).toBe(0);
    });

    it('finds neighbours only inside the grid', () => {
      expect(dungeon.getAdjacentRoom(dungeon.at(1, 1), Direction.NORTH)).toBe(dungeon.at(0, 1));
      expect(dungeon.getAdjacentRoom(dungeon.at(2, 3), Direction.SOUTH)).toBeNull();
    });
  });

  it('marks entrance and exit rooms', () => {
    dungeon.setEntrance(2, 2).setExit(0, 2);
    expect(dungeon.entrance).toBe(dungeon.at(2, 2));
    expect(dungeon.at(2, 2).roomType).toBe(RoomType.ENTRANCE);
    expect(dungeon.exit?.roomType).toBe(RoomType.EXIT);
  });

  it('discovers a room and its linked neighbours', () => {
    dungeon.linkRooms(dungeon.at(1, 1), Direction.NORTH);
    dungeon.linkRooms(dungeon.at(1, 1), Direction.EAST);
    dungeon.discoverRoom(1, 1);
    const discovered = dungeon.allRooms().filter((r) => r.discovered).map((r) => [r.row, r.col]);
    expect(discovered).toEqual([[0, 1], [1, 1], [1, 2]]);
  });

  it('walks links to find reachable rooms', () => {
    dungeon.linkRooms(dungeon.at(2, 0), Direction.NORTH);
    dungeon.linkRooms(dungeon.at(1, 0), Direction.EAST);
    const reachable = dungeon.reachableFrom(dungeon.at(2, 0));
    expect(reachable.size).toBe(3);
    expect(reachable.has(dungeon.at(1, 1))).toBe(true);
    expect(reachable.has(dungeon.at(0, 0))).toBe(false);
  });

  // -----------------------------------------------------------------------
  // Serialization
  // -----------------------------------------------------------------------

  describe('serialization', () => {
    it('restores layout, markers and content', () => {
      dungeon.linkRooms(dungeon.at(2, 2), Direction.NORTH);
      dungeon.setEntrance(2, 2).setExit(0, 2);
      dungeon.at(1, 2).description = 'A quiet corridor.';

      const data = dungeon.toDict();
      expect(data.entrance).toEqual([2, 2]);
      expect(data.exit).toEqual([0, 2]);

      const copy = DungeonLevel.fromDict(data);
      expect(copy.entrance).toBe(copy.at(2, 2));
      expect(copy.theme).toBe('cyber');
      expect(copy.at(1, 2).linked(Direction.SOUTH)).toBe(true);
      expect(copy.toDict()).toEqual(data);
    });

    it('skips rooms outside the grid', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const data = dungeon.toDict();
      data.rooms.push({ ...data.rooms[0], row: 7 });
      const copy = DungeonLevel.fromDict(data);
      expect(copy.allRooms()).toHaveLength(12);
      expect(warn).toHaveBeenCalledWith('[DungeonLevel] Skipping room (7, 0) outside the 3x4 grid');
      warn.mockRestore();
    });

    it('rebuilds links two-way and drops those leaving the grid', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const data = dungeon.toDict();
      data.rooms[5].links = Direction.EAST; // (1, 1) only
      data.rooms[0].links = Direction.NORTH | Direction.WEST;

      const copy = DungeonLevel.fromDict(data);
      expect(copy.at(1, 1).linked(Direction.EAST)).toBe(true);
      expect(copy.at(1, 2).linked(Direction.WEST)).toBe(true);
      expect(copy.at(0, 0).links).toBe(0);
      expect(warn).toHaveBeenCalledWith('[DungeonLevel] Dropping north link of (0, 0): it leaves the 3x4 grid');
      expect(warn).toHaveBeenCalledWith('[DungeonLevel] Dropping west link of (0, 0): it leaves the 3x4 grid');
      expect(warn).toHaveBeenCalledTimes(2);
      warn.mockRestore();
    });

    it('rejects malformed data', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      expect(() => DungeonLevel.fromDict({ rows: 'three' })).toThrow(SerializationError);
      error.mockRestore();
    });
  });
});
