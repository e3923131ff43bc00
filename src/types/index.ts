export * from './event.js';
export * from './rule.js';
export * from './action.js';
export * from './validation.js';
export * from './state.js';
export * from './test.js';
