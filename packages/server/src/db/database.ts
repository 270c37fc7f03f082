import BetterSqlite3 from 'better-sqlite3';
import type {
  DiscussionComment,
  DiscussionTopic,
  Room,
  RoomSummary,
  VoteKind,
  VoteTally,
} from '@mindroom/shared';
import { generateId, generateRoomCode, logger } from '@mindroom/shared';
import type { RoomRepository } from '../ai/mindmap/types.js';
import type { WorkspaceRecord, WorkspaceStore } from '../ai/client.js';

const log = logger('db');

/** Attempts at drawing an unused room code before giving up. */
const MAX_ROOM_CODE_ATTEMPTS = 10;

/**
 * Open (or create) the SQLite database and ensure every table exists.
 *
 * WAL journal mode is enabled for concurrent read performance and foreign
 * keys are enforced so deleting a room removes its discussion.
 *
 * @param dbPath - File path, or `':memory:'` for tests.
 * @returns An open handle. The caller closes it during shutdown.
 */
export function setupDatabase(dbPath: string): BetterSqlite3.Database {
  const db = new BetterSqlite3(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(`
    CREATE TABLE IF NOT EXISTS rooms (
      code TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      workspace_slug TEXT,
      created_at INTEGER NOT NULL
    )
  `);
  db.exec(`
    CREATE TABLE IF NOT EXISTS topics (
      id TEXT PRIMARY KEY,
      room_code TEXT NOT NULL REFERENCES rooms(code) ON DELETE CASCADE,
      name TEXT NOT NULL,
      created_at INTEGER NOT NULL
    )
  `);
  db.exec(`
    CREATE TABLE IF NOT EXISTS comments (
      id TEXT PRIMARY KEY,
      topic_id TEXT NOT NULL REFERENCES topics(id) ON DELETE CASCADE,
      nickname TEXT NOT NULL,
      content TEXT NOT NULL,
      created_at INTEGER NOT NULL
    )
  `);
  db.exec(`
    CREATE TABLE IF NOT EXISTS votes (
      comment_id TEXT NOT NULL REFERENCES comments(id) ON DELETE CASCADE,
      voter_id TEXT NOT NULL,
      kind TEXT NOT NULL CHECK (kind IN ('good', 'bad')),
      PRIMARY KEY (comment_id, voter_id)
    )
  `);
  db.exec(`
    CREATE TABLE IF NOT EXISTS workspaces (
      slug TEXT PRIMARY KEY,
      room_code TEXT NOT NULL,
      title TEXT NOT NULL,
      created_at INTEGER NOT NULL
    )
  `);
  db.exec('CREATE INDEX IF NOT EXISTS idx_topics_room ON topics(room_code)');
  db.exec('CREATE INDEX IF NOT EXISTS idx_comments_topic ON comments(topic_id)');

  log.info('SQLite database initialized', { path: dbPath });
  return db;
}

// ─── Rooms ───────────────────────────────────────────────────────────

interface RoomRow {
  code: string;
  title: string;
  workspace_slug: string | null;
  created_at: number;
}

interface TopicRow {
  id: string;
  name: string;
  created_at: number;
}

interface CommentRow {
  id: string;
  topic_id: string;
  nickname: string;
  content: string;
  created_at: number;
  good: number;
  bad: number;
}

function rowToSummary(row: RoomRow): RoomSummary {
  return {
    code: row.code,
    title: row.title,
    workspaceSlug: row.workspace_slug,
    createdAt: row.created_at,
  };
}

function rowToComment(row: CommentRow): DiscussionComment {
  return {
    id: row.id,
    nickname: row.nickname,
    content: row.content,
    votes: { good: row.good, bad: row.bad },
    createdAt: row.created_at,
  };
}

/**
 * Create a room under a freshly drawn, unused code.
 *
 * @throws {Error} If no free code was found after a few attempts.
 */
export function createRoom(
  db: BetterSqlite3.Database,
  title: string,
  generateCode: () => string = generateRoomCode,
): RoomSummary {
  const exists = db.prepare('SELECT 1 FROM rooms WHERE code = ?');
  for (let attempt = 0; attempt < MAX_ROOM_CODE_ATTEMPTS; attempt++) {
    const code = generateCode();
    if (exists.get(code)) continue;

    const now = Date.now();
    db.prepare('INSERT INTO rooms (code, title, workspace_slug, created_at) VALUES (?, ?, NULL, ?)').run(
      code,
      title,
      now,
    );
    return { code, title, workspaceSlug: null, createdAt: now };
  }
  throw new Error(`Could not allocate a room code after ${String(MAX_ROOM_CODE_ATTEMPTS)} attempts`);
}

export function getRoomSummary(db: BetterSqlite3.Database, code: string): RoomSummary | null {
  const row = db
    .prepare('SELECT code, title, workspace_slug, created_at FROM rooms WHERE code = ?')
    .get(code) as RoomRow | undefined;
  return row ? rowToSummary(row) : null;
}

/**
 * Load a room with its topics, comments and vote tallies.
 *
 * Topics and comments come back in creation order.
 */
export function getRoom(db: BetterSqlite3.Database, code: string): Room | null {
  const summary = getRoomSummary(db, code);
  if (!summary) return null;

  const topicRows = db
    .prepare('SELECT id, name, created_at FROM topics WHERE room_code = ? ORDER BY created_at, rowid')
    .all(code) as TopicRow[];

  const commentRows = db
    .prepare(
      `SELECT c.id, c.topic_id, c.nickname, c.content, c.created_at,
              COALESCE(SUM(v.kind = 'good'), 0) AS good,
              COALESCE(SUM(v.kind = 'bad'), 0) AS bad
         FROM comments c
         JOIN topics t ON t.id = c.topic_id
         LEFT JOIN votes v ON v.comment_id = c.id
        WHERE t.room_code = ?
        GROUP BY c.id
        ORDER BY c.created_at, c.rowid`,
    )
    .all(code) as CommentRow[];

  const commentsByTopic = new Map<string, DiscussionComment[]>();
  for (const row of commentRows) {
    const list = commentsByTopic.get(row.topic_id) ?? [];
    list.push(rowToComment(row));
    commentsByTopic.set(row.topic_id, list);
  }

  const topics: DiscussionTopic[] = topicRows.map((row) => ({
    id: row.id,
    name: row.name,
    comments: commentsByTopic.get(row.id) ?? [],
    createdAt: row.created_at,
  }));

  return { ...summary, topics };
}

export function setRoomWorkspaceSlug(db: BetterSqlite3.Database, code: string, slug: string): void {
  db.prepare('UPDATE rooms SET workspace_slug = ? WHERE code = ?').run(slug, code);
}

// ─── Discussion ──────────────────────────────────────────────────────

/** Open a topic in a room; `null` when the room does not exist. */
export function addTopic(
  db: BetterSqlite3.Database,
  roomCode: string,
  name: string,
): DiscussionTopic | null {
  if (!getRoomSummary(db, roomCode)) return null;
  const topic: DiscussionTopic = { id: generateId(), name, comments: [], createdAt: Date.now() };
  db.prepare('INSERT INTO topics (id, room_code, name, created_at) VALUES (?, ?, ?, ?)').run(
    topic.id,
    roomCode,
    topic.name,
    topic.createdAt,
  );
  return topic;
}

/** Post a comment under a topic; `null` when the topic is not in the room. */
export function addComment(
  db: BetterSqlite3.Database,
  roomCode: string,
  topicId: string,
  nickname: string,
  content: string,
): DiscussionComment | null {
  const topic = db.prepare('SELECT 1 FROM topics WHERE id = ? AND room_code = ?').get(topicId, roomCode);
  if (!topic) return null;

  const comment: DiscussionComment = {
    id: generateId(),
    nickname,
    content,
    votes: { good: 0, bad: 0 },
    createdAt: Date.now(),
  };
  db.prepare('INSERT INTO comments (id, topic_id, nickname, content, created_at) VALUES (?, ?, ?, ?, ?)').run(
    comment.id,
    topicId,
    comment.nickname,
    comment.content,
    comment.createdAt,
  );
  return comment;
}

export function getVoteTally(db: BetterSqlite3.Database, commentId: string): VoteTally {
  const row = db
    .prepare(
      `SELECT COALESCE(SUM(kind = 'good'), 0) AS good, COALESCE(SUM(kind = 'bad'), 0) AS bad
         FROM votes WHERE comment_id = ?`,
    )
    .get(commentId) as VoteTally | undefined;
  return row ?? { good: 0, bad: 0 };
}

/**
 * Record `voterId`'s vote on a comment. A voter holds at most one vote per
 * comment; voting again replaces the previous kind.
 *
 * @returns The updated tally, or `null` when the comment is not in the room.
 */
export function castVote(
  db: BetterSqlite3.Database,
  roomCode: string,
  commentId: string,
  voterId: string,
  kind: VoteKind,
): VoteTally | null {
  const comment = db
    .prepare(
      `SELECT 1 FROM comments c JOIN topics t ON t.id = c.topic_id
        WHERE c.id = ? AND t.room_code = ?`,
    )
    .get(commentId, roomCode);
  if (!comment) return null;

  db.prepare('INSERT OR REPLACE INTO votes (comment_id, voter_id, kind) VALUES (?, ?, ?)').run(
    commentId,
    voterId,
    kind,
  );
  return getVoteTally(db, commentId);
}

// ─── AI workspaces ───────────────────────────────────────────────────

interface WorkspaceRow {
  slug: string;
  room_code: string;
  title: string;
  created_at: number;
}

export function getWorkspace(db: BetterSqlite3.Database, slug: string): WorkspaceRecord | null {
  const row = db
    .prepare('SELECT slug, room_code, title, created_at FROM workspaces WHERE slug = ?')
    .get(slug) as WorkspaceRow | undefined;
  if (!row) return null;
  return { slug: row.slug, roomCode: row.room_code, title: row.title, createdAt: row.created_at };
}

/** Insert a workspace unless one with the same slug already exists. */
export function createWorkspace(db: BetterSqlite3.Database, record: WorkspaceRecord): void {
  db.prepare('INSERT OR IGNORE INTO workspaces (slug, room_code, title, created_at) VALUES (?, ?, ?, ?)').run(
    record.slug,
    record.roomCode,
    record.title,
    record.createdAt,
  );
}

// ─── Adapters ────────────────────────────────────────────────────────

/** Expose the room tables through the interface the mind-map pipeline consumes. */
export function createRoomRepository(db: BetterSqlite3.Database): RoomRepository {
  return {
    getRoom: (code) => getRoom(db, code),
    setWorkspaceSlug: (code, slug) => {
      setRoomWorkspaceSlug(db, code, slug);
    },
  };
}

export function createWorkspaceStore(db: BetterSqlite3.Database): WorkspaceStore {
  return {
    get: (slug) => getWorkspace(db, slug),
    create: (record) => {
      createWorkspace(db, record);
    },
  };
}
