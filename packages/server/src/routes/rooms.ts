import { Router } from 'express';
import type { Request } from 'express';
import type BetterSqlite3 from 'better-sqlite3';
import {
  CAST_VOTE_SCHEMA,
  CREATE_COMMENT_SCHEMA,
  CREATE_ROOM_SCHEMA,
  CREATE_TOPIC_SCHEMA,
  logger,
  normalizeRoomCode,
} from '@mindroom/shared';
import type { CastVoteBody, CreateCommentBody, CreateRoomBody, CreateTopicBody } from '@mindroom/shared';
import { addComment, addTopic, castVote, createRoom, getRoom } from '../db/database.js';
import { validateBody } from '../middleware/validateBody.js';
import { ANONYMOUS_NICKNAME } from '../ai/mindmap/prompt.js';

const log = logger('rooms');

/** Router for `/api/rooms`: the discussion data the mind maps summarise. */
export function createRoomRouter(db: BetterSqlite3.Database): Router {
  const router = Router();

  // POST /api/rooms — open a room under a new code
  router.post('/', validateBody(CREATE_ROOM_SCHEMA), (req, res) => {
    const { title }: CreateRoomBody = req.body;
    const trimmed = title.trim();
    if (!trimmed) {
      res.status(400).json({ error: 'Room title must not be blank' });
      return;
    }
    const room = createRoom(db, trimmed);
    log.info('room created', { code: room.code });
    res.status(201).json(room);
  });

  // GET /api/rooms/:code — room with topics, comments and tallies
  router.get('/:code', (req, res) => {
    const room = getRoom(db, normalizeRoomCode(req.params.code));
    if (!room) {
      res.status(404).json({ error: 'Room not found' });
      return;
    }
    res.json(room);
  });

  // POST /api/rooms/:code/topics — open a discussion topic
  router.post('/:code/topics', validateBody(CREATE_TOPIC_SCHEMA), (req: Request<{ code: string }>, res) => {
    const { name }: CreateTopicBody = req.body;
    const trimmed = name.trim();
    if (!trimmed) {
      res.status(400).json({ error: 'Topic name must not be blank' });
      return;
    }
    const topic = addTopic(db, normalizeRoomCode(req.params.code), trimmed);
    if (!topic) {
      res.status(404).json({ error: 'Room not found' });
      return;
    }
    res.status(201).json(topic);
  });

  // POST /api/rooms/:code/topics/:topicId/comments — comment under a topic
  router.post('/:code/topics/:topicId/comments', validateBody(CREATE_COMMENT_SCHEMA), (req: Request<{ code: string; topicId: string }>, res) => {
    const { nickname, content }: CreateCommentBody = req.body;
    const text = content.trim();
    if (!text) {
      res.status(400).json({ error: 'Comment must not be blank' });
      return;
    }
    const comment = addComment(
      db,
      normalizeRoomCode(req.params.code),
      req.params.topicId,
      nickname?.trim() || ANONYMOUS_NICKNAME,
      text,
    );
    if (!comment) {
      res.status(404).json({ error: 'Topic not found' });
      return;
    }
    res.status(201).json(comment);
  });

  // POST /api/rooms/:code/comments/:commentId/votes — thumbs up / down
  router.post('/:code/comments/:commentId/votes', validateBody(CAST_VOTE_SCHEMA), (req: Request<{ code: string; commentId: string }>, res) => {
    const { voterId, kind }: CastVoteBody = req.body;
    const tally = castVote(db, normalizeRoomCode(req.params.code), req.params.commentId, voterId, kind);
    if (!tally) {
      res.status(404).json({ error: 'Comment not found' });
      return;
    }
    res.json(tally);
  });

  return router;
}
