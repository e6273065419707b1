export * from './logger.js';
export * from './errors.js';
export * from './casing.js';
