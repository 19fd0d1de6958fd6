export * from './agent-types.js';
