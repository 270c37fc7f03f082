import { describe, it, expect, vi, afterEach } from 'vitest';
import { errorData, isDebugSuppressed, logger } from './logger.js';

describe('isDebugSuppressed', () => {
  it('is on for every namespace when unset', () => {
    expect(isDebugSuppressed('mindmap', '')).toBe(false);
  });

  it('is off for "false" and "0"', () => {
    expect(isDebugSuppressed('mindmap', 'false')).toBe(true);
    expect(isDebugSuppressed('mindmap', '0')).toBe(true);
  });

  it('is on for "true", "1" and "*"', () => {
    expect(isDebugSuppressed('mindmap', 'true')).toBe(false);
    expect(isDebugSuppressed('mindmap', '1')).toBe(false);
    expect(isDebugSuppressed('mindmap', '*')).toBe(false);
  });

  it('only enables listed namespaces', () => {
    expect(isDebugSuppressed('mindmap', 'mindmap, rooms')).toBe(false);
    expect(isDebugSuppressed('rooms', 'mindmap, rooms')).toBe(false);
    expect(isDebugSuppressed('ai', 'mindmap, rooms')).toBe(true);
  });
});

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('prefixes messages with the namespace', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    logger('rooms').info('room created', { code: 'ABC234' });
    expect(spy).toHaveBeenCalledWith('[rooms]', 'room created', { code: 'ABC234' });
  });

  it('omits the data argument when none is given', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    logger('ai').warn('slow');
    expect(spy).toHaveBeenCalledWith('[ai]', 'slow');
  });

  it('writes debug output through console.log', () => {
    vi.stubEnv('MINDROOM_DEBUG', 'mindmap');
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger('mindmap').debug('outline parsed', { nodes: 6 });
    expect(spy).toHaveBeenCalledWith('[mindmap]', 'outline parsed', { nodes: 6 });
  });

  it('drops debug output when MINDROOM_DEBUG disables it', () => {
    vi.stubEnv('MINDROOM_DEBUG', 'false');
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger('mindmap').debug('hidden');
    expect(spy).not.toHaveBeenCalled();
  });

  it('never drops errors', () => {
    vi.stubEnv('MINDROOM_DEBUG', 'false');
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logger('mindmap').error('boom');
    expect(spy).toHaveBeenCalledWith('[mindmap]', 'boom');
  });
});

describe('errorData', () => {
  it('keeps message and stack of an Error', () => {
    const err = new Error('disk full');
    expect(errorData(err)).toEqual({ error: 'disk full', stack: err.stack });
  });

  it('stringifies anything else', () => {
    expect(errorData(42)).toEqual({ error: '42' });
  });
});
