// Re-export all protocol types

export * from './common.js';
export * from './sessions.js';
export * from './payloads.js';
