// ─── Room limits ─────────────────────────────────────────────────────

/** Maximum allowed length for a room title. */
export const MAX_ROOM_TITLE_LENGTH = 100;

/** Maximum allowed length for a discussion topic name. */
export const MAX_TOPIC_NAME_LENGTH = 200;

/** Maximum allowed length for a single comment. */
export const MAX_COMMENT_LENGTH = 1000;

/** Maximum allowed length for a participant nickname. */
export const MAX_NICKNAME_LENGTH = 40;

/** Maximum accepted size of caller-supplied mind-map Markdown. */
export const MAX_CUSTOM_CONTENT_LENGTH = 20_000;

/** Length of generated room codes. */
export const ROOM_CODE_LENGTH = 6;

/**
 * Characters used for room codes. Omits `0/O` and `1/I/L` so codes can be
 * read aloud in a meeting.
 */
export const ROOM_CODE_ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789';

// ─── Mind-map canvas ─────────────────────────────────────────────────

/**
 * Deterministic layout parameters for the mind-map SVG.
 *
 * The root topic sits on the left edge, its subtopics ("branches") fan out
 * vertically to the right and each branch's items fan out further right.
 * All values are in SVG user units.
 */
export const MINDMAP_LAYOUT = {
  CANVAS_WIDTH: 1200,
  CANVAS_HEIGHT: 800,

  ROOT: {
    CENTER_X: 100,
    MAX_TEXT_WIDTH: 300,
    FONT_SIZE: 18,
    MIN_WIDTH: 160,
    PADDING_X: 40,
    MIN_HEIGHT: 50,
    LINE_HEIGHT: 22,
    PADDING_Y: 10,
    CORNER_RADIUS: 25,
    BASELINE_OFFSET: 5,
  },

  BRANCH: {
    /** Horizontal gap between the root box and the branch column. */
    GAP_X: 50,
    MAX_SPACING: 150,
    /** Vertical space kept free above and below the fan, in total. */
    VERTICAL_MARGIN: 200,
    MAX_TEXT_WIDTH: 200,
    FONT_SIZE: 14,
    MIN_WIDTH: 120,
    PADDING_X: 30,
    MIN_HEIGHT: 35,
    LINE_HEIGHT: 18,
    PADDING_Y: 10,
    CORNER_RADIUS: 17,
    /** The curved connector bends this far before the branch box. */
    ELBOW_OFFSET: 20,
    BASELINE_OFFSET: 4,
  },

  ITEM: {
    GAP_X: 30,
    MAX_PER_BRANCH: 5,
    /** Index of the item that sits level with its branch. */
    CENTER_SLOT: 2,
    SPACING: 30,
    MAX_TEXT_WIDTH: 150,
    FONT_SIZE: 11,
    MIN_WIDTH: 100,
    PADDING_X: 20,
    MIN_HEIGHT: 20,
    LINE_HEIGHT: 14,
    PADDING_Y: 6,
    CORNER_RADIUS: 10,
    TEXT_INSET: 10,
    BASELINE_OFFSET: 3,
  },
} as const;

/** Width factor (× font size) of a character with code point > 127. */
export const WIDE_GLYPH_FACTOR = 0.9;

/** Width factor (× font size) of an ASCII character. */
export const NARROW_GLYPH_FACTOR = 0.6;

/**
 * Mind-map palette. Referenced by name from the SVG renderer so the theme
 * can be swapped in one place.
 */
export const MINDMAP_COLORS = {
  background: '#f8fffe',
  main: '#2e7d6b',
  level1: '#4a9b8e',
  level2: '#7bb3a9',
  level3: '#a8cdc4',
  text: '#1a4037',
  line: '#4a9b8e',
} as const;

export type MindmapColorName = keyof typeof MINDMAP_COLORS;

/** MIME type of every generated mind-map artifact. */
export const MINDMAP_CONTENT_TYPE = 'image/svg+xml';

// ─── AI limits ───────────────────────────────────────────────────────

/** Default mind-map requests per IP per minute (enforced by `express-rate-limit`). */
export const MINDMAP_RATE_LIMIT_PER_MINUTE = 10;
