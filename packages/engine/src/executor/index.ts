export * from './types.js';
export * from './local-runner.js';
