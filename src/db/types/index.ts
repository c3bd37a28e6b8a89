export * from './enums.js';
export * from './stat-vector.js';
export * from './character.js';
export * from './action.js';
export * from './run.js';
