export * from './errors.js';
export * from './source.js';
export * from './read.js';
export * from './write.js';
export * from './files.js';
