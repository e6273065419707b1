export * from './schemas.js';
export * from './bridge-config.js';
