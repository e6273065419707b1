export * from './framing.js';
export * from './tokens.js';
export * from './handshake.js';
export * from './types.js';
export * from './id-generator.js';
export * from './writer.js';
export * from './correlation.js';
