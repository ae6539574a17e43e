export * from './types.js';
export * from './pitch.js';
export * from './model.js';
export * from './validation.js';
