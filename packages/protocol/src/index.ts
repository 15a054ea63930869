// @castwatch/protocol
// Shared vocabulary for model state updates: types, constants, validation

export * from './types/index.js';
export * from './constants/index.js';
export * from './validation/index.js';
export * from './text/index.js';
