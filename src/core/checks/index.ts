export * from './types.js';
export * from './registry.js';
export * from './notices.js';
export * from './runner.js';
export * from './protocol.js';
