import { describe, it, expect } from 'vitest';
import {
  generateId,
  generateRoomCode,
  isValidId,
  isValidRoomCode,
  normalizeRoomCode,
} from './id.js';
import { ROOM_CODE_ALPHABET, ROOM_CODE_LENGTH } from './constants.js';

describe('generateId', () => {
  it('returns a valid UUID v4', () => {
    expect(isValidId(generateId())).toBe(true);
  });

  it('returns distinct ids', () => {
    expect(generateId()).not.toBe(generateId());
  });
});

describe('isValidId', () => {
  it('rejects malformed ids', () => {
    expect(isValidId('not-a-uuid')).toBe(false);
    expect(isValidId('')).toBe(false);
  });
});

describe('generateRoomCode', () => {
  it('draws only from the unambiguous alphabet', () => {
    for (let i = 0; i < 50; i++) {
      const code = generateRoomCode();
      expect(code).toHaveLength(ROOM_CODE_LENGTH);
      for (const ch of code) {
        expect(ROOM_CODE_ALPHABET).toContain(ch);
      }
      expect(isValidRoomCode(code)).toBe(true);
    }
  });
});

describe('normalizeRoomCode', () => {
  it('trims and upper-cases', () => {
    expect(normalizeRoomCode('  k7qx2m ')).toBe('K7QX2M');
  });

  it('leaves blank input blank', () => {
    expect(normalizeRoomCode('   ')).toBe('');
  });
});

describe('isValidRoomCode', () => {
  it('rejects codes with ambiguous characters or the wrong length', () => {
    expect(isValidRoomCode('K7QX2O')).toBe(false);
    expect(isValidRoomCode('K7QX2')).toBe(false);
    expect(isValidRoomCode('k7qx2m')).toBe(false);
  });
});
