export * from './jobs.js';
export * from './wire.js';
export * from './gateway.js';
