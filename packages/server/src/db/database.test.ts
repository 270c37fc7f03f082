import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type BetterSqlite3 from 'better-sqlite3';
import {
  addComment,
  addTopic,
  castVote,
  createRoom,
  createRoomRepository,
  createWorkspace,
  createWorkspaceStore,
  getRoom,
  getRoomSummary,
  getVoteTally,
  getWorkspace,
  setRoomWorkspaceSlug,
  setupDatabase,
} from './database.js';

let db: BetterSqlite3.Database;

describe('database', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    db = setupDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  describe('setupDatabase', () => {
    it('is idempotent', () => {
      const room = createRoom(db, 'Kept');
      expect(() => setupDatabase(':memory:').close()).not.toThrow();
      expect(getRoomSummary(db, room.code)?.title).toBe('Kept');
    });
  });

  describe('createRoom', () => {
    it('stores a room without a workspace', () => {
      const room = createRoom(db, 'Planning', () => 'ABC234');
      expect(room).toMatchObject({ code: 'ABC234', title: 'Planning', workspaceSlug: null });
      expect(getRoomSummary(db, 'ABC234')).toEqual(room);
    });

    it('draws again when the code is taken', () => {
      createRoom(db, 'First', () => 'ABC234');
      const codes = ['ABC234', 'XYZ789'];
      const room = createRoom(db, 'Second', () => codes.shift() ?? 'ZZZ999');
      expect(room.code).toBe('XYZ789');
    });

    it('gives up after repeated collisions', () => {
      createRoom(db, 'First', () => 'ABC234');
      expect(() => createRoom(db, 'Second', () => 'ABC234')).toThrow('Could not allocate a room code after 10 attempts');
    });
  });

  describe('getRoom', () => {
    it('returns null for an unknown room', () => {
      expect(getRoom(db, 'NOPE22')).toBeNull();
    });

    it('assembles topics and comments in creation order', () => {
      const { code } = createRoom(db, 'Retro');
      const wins = addTopic(db, code, 'Wins');
      const risks = addTopic(db, code, 'Risks');
      if (!wins || !risks) throw new Error('topics not created');
      addComment(db, code, wins.id, 'Ana', 'Shipped');
      addComment(db, code, wins.id, 'Bo', 'Fewer bugs');
      addComment(db, code, risks.id, 'Cy', 'Hiring');

      const room = getRoom(db, code);
      expect(room?.topics.map((t) => t.name)).toEqual(['Wins', 'Risks']);
      expect(room?.topics[0]?.comments.map((c) => c.content)).toEqual(['Shipped', 'Fewer bugs']);
      expect(room?.topics[1]?.comments.map((c) => c.nickname)).toEqual(['Cy']);
    });

    it('does not mix in other rooms', () => {
      const a = createRoom(db, 'A', () => 'AAAAAA');
      const b = createRoom(db, 'B', () => 'BBBBBB');
      addTopic(db, b.code, 'Elsewhere');
      expect(getRoom(db, a.code)?.topics).toEqual([]);
    });
  });

  describe('addTopic / addComment', () => {
    it('refuses a topic for an unknown room', () => {
      expect(addTopic(db, 'NOPE22', 'Lost')).toBeNull();
    });

    it('refuses a comment under a topic of another room', () => {
      const a = createRoom(db, 'A', () => 'AAAAAA');
      const b = createRoom(db, 'B', () => 'BBBBBB');
      const topic = addTopic(db, a.code, 'Only in A');
      if (!topic) throw new Error('topic not created');
      expect(addComment(db, b.code, topic.id, 'Eve', 'Sneaky')).toBeNull();
    });

    it('starts comments with no votes', () => {
      const { code } = createRoom(db, 'R');
      const topic = addTopic(db, code, 'T');
      if (!topic) throw new Error('topic not created');
      expect(addComment(db, code, topic.id, 'Ana', 'Hi')?.votes).toEqual({ good: 0, bad: 0 });
    });
  });

  describe('castVote', () => {
    let code: string;
    let commentId: string;

    beforeEach(() => {
      code = createRoom(db, 'Votes').code;
      const topic = addTopic(db, code, 'T');
      if (!topic) throw new Error('topic not created');
      const comment = addComment(db, code, topic.id, 'Ana', 'Idea');
      if (!comment) throw new Error('comment not created');
      commentId = comment.id;
    });

    it('tallies votes per kind', () => {
      castVote(db, code, commentId, 'v1', 'good');
      castVote(db, code, commentId, 'v2', 'good');
      expect(castVote(db, code, commentId, 'v3', 'bad')).toEqual({ good: 2, bad: 1 });
    });

    it('lets a voter change their vote', () => {
      castVote(db, code, commentId, 'v1', 'good');
      expect(castVote(db, code, commentId, 'v1', 'bad')).toEqual({ good: 0, bad: 1 });
    });

    it('shows tallies on the assembled room', () => {
      castVote(db, code, commentId, 'v1', 'good');
      expect(getRoom(db, code)?.topics[0]?.comments[0]?.votes).toEqual({ good: 1, bad: 0 });
    });

    it('returns null for a comment outside the room', () => {
      expect(castVote(db, code, 'missing', 'v1', 'good')).toBeNull();
      expect(getVoteTally(db, commentId)).toEqual({ good: 0, bad: 0 });
    });
  });

  describe('workspaces', () => {
    it('stores the workspace slug on the room', () => {
      const { code } = createRoom(db, 'R');
      setRoomWorkspaceSlug(db, code, 'room-x');
      expect(getRoomSummary(db, code)?.workspaceSlug).toBe('room-x');
    });

    it('keeps the first record for a slug', () => {
      createWorkspace(db, { slug: 'room-a', roomCode: 'AAAAAA', title: 'First', createdAt: 1 });
      createWorkspace(db, { slug: 'room-a', roomCode: 'AAAAAA', title: 'Second', createdAt: 2 });
      expect(getWorkspace(db, 'room-a')).toEqual({ slug: 'room-a', roomCode: 'AAAAAA', title: 'First', createdAt: 1 });
      expect(getWorkspace(db, 'room-b')).toBeNull();
    });

    it('exposes repository and store adapters over the same tables', () => {
      const { code } = createRoom(db, 'Adapters');
      const rooms = createRoomRepository(db);
      const store = createWorkspaceStore(db);

      store.create({ slug: 'room-ad', roomCode: code, title: 'Adapters', createdAt: 5 });
      rooms.setWorkspaceSlug(code, 'room-ad');

      expect(rooms.getRoom(code)?.workspaceSlug).toBe('room-ad');
      expect(store.get('room-ad')?.title).toBe('Adapters');
    });
  });
});
