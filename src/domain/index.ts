/**
 * Domain model exports.
 */

export * from './artifact';
export * from './errors';
export * from './events';
export * from './run';
export * from './trigger';
export * from './workflow';
