export * from './stage.js';
export * from './outcome.js';
export * from './run.js';
export * from './events.js';
export * from './briefing.js';
