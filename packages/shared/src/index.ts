export * from './errors.js';
export * from './operations.js';
export * from './protocol.js';
export * from './frame-reader.js';
export * from './codec.js';
export * from './artifacts.js';
