/**
 * Identifier helpers shared by the server and its tests.
 *
 * Every topic, comment and transient artifact gets a UUID v4; rooms get a
 * short code that participants can type in.
 */

import { randomInt, randomUUID } from 'node:crypto';
import { ROOM_CODE_ALPHABET, ROOM_CODE_LENGTH } from './constants.js';

/** UUID v4 regex for validation. */
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

const ROOM_CODE_RE = new RegExp(`^[${ROOM_CODE_ALPHABET}]{${String(ROOM_CODE_LENGTH)}}$`);

/** Generate a new UUID v4 string. */
export function generateId(): string {
  return randomUUID();
}

/** Validate that a string is a well-formed UUID v4. */
export function isValidId(id: string): boolean {
  return UUID_RE.test(id);
}

/** Generate a short, human-friendly room code (e.g. `"K7QX2M"`). */
export function generateRoomCode(): string {
  let code = '';
  for (let i = 0; i < ROOM_CODE_LENGTH; i++) {
    code += ROOM_CODE_ALPHABET.charAt(randomInt(ROOM_CODE_ALPHABET.length));
  }
  return code;
}

/** Normalise user input into the canonical room code form (upper case, trimmed). */
export function normalizeRoomCode(input: string): string {
  return input.trim().toUpperCase();
}

/** Validate that a string is a well-formed room code. */
export function isValidRoomCode(code: string): boolean {
  return ROOM_CODE_RE.test(code);
}
