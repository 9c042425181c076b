export * from './codec.js';
export * from './errors.js';
export * from './manager.js';
export * from './node.js';
export * from './player.js';
export * from './queue.js';
export * from './rest.js';
export * from './socket.js';
export * from './types.js';
