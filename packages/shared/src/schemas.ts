// ─── Request body schemas ────────────────────────────────────────────
//
// JSON Schema (draft-07) objects compiled by Ajv on the server. Kept here
// next to the record types they describe.

import {
  MAX_COMMENT_LENGTH,
  MAX_CUSTOM_CONTENT_LENGTH,
  MAX_NICKNAME_LENGTH,
  MAX_ROOM_TITLE_LENGTH,
  MAX_TOPIC_NAME_LENGTH,
} from './constants.js';

/** Body of `POST /api/mindmap/generate`. Both fields are optional. */
export const MINDMAP_REQUEST_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  title: 'MindmapRequest',
  type: 'object',
  additionalProperties: false,
  properties: {
    roomCode: { type: 'string', maxLength: 32 },
    customContent: { type: 'string', maxLength: MAX_CUSTOM_CONTENT_LENGTH },
  },
} as const;

/** Body of `POST /api/mindmap/preview`. */
export const MINDMAP_PREVIEW_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  title: 'MindmapPreviewRequest',
  type: 'object',
  additionalProperties: false,
  required: ['roomCode'],
  properties: {
    roomCode: { type: 'string', minLength: 1, maxLength: 32 },
  },
} as const;

export interface CreateRoomBody {
  title: string;
}

export const CREATE_ROOM_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  title: 'CreateRoom',
  type: 'object',
  additionalProperties: false,
  required: ['title'],
  properties: {
    title: { type: 'string', minLength: 1, maxLength: MAX_ROOM_TITLE_LENGTH },
  },
} as const;

export interface CreateTopicBody {
  name: string;
}

export const CREATE_TOPIC_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  title: 'CreateTopic',
  type: 'object',
  additionalProperties: false,
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1, maxLength: MAX_TOPIC_NAME_LENGTH },
  },
} as const;

export interface CreateCommentBody {
  nickname?: string;
  content: string;
}

export const CREATE_COMMENT_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  title: 'CreateComment',
  type: 'object',
  additionalProperties: false,
  required: ['content'],
  properties: {
    nickname: { type: 'string', maxLength: MAX_NICKNAME_LENGTH },
    content: { type: 'string', minLength: 1, maxLength: MAX_COMMENT_LENGTH },
  },
} as const;

export interface CastVoteBody {
  voterId: string;
  kind: 'good' | 'bad';
}

export const CAST_VOTE_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  title: 'CastVote',
  type: 'object',
  additionalProperties: false,
  required: ['voterId', 'kind'],
  properties: {
    voterId: { type: 'string', minLength: 1, maxLength: 64 },
    kind: { enum: ['good', 'bad'] },
  },
} as const;
