export * from './timestamp.js';
export * from './task.js';
export * from './history.js';
