export * from './types.js';
export * from './diagnostic.js';
export * from './location.js';
export * from './codec.js';
