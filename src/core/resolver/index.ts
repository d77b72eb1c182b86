export * from './types.js';
export * from './request.js';
export * from './nix-expression.js';
export * from './evaluator.js';
export * from './response.js';
export * from './diagnostics.js';
export * from './transformations.js';
export * from './resolver.js';
