export * from './team.js';
export * from './modifier.js';
export * from './status.js';
export * from './targeting.js';
export * from './unit.js';
export * from './battle.js';
