export * from './constants.js';
export * from './id.js';
export * from './logger.js';
export * from './schemas.js';
export * from './types.js';
