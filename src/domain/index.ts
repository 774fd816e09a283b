/**
 * Domain model exports.
 */

export * from './analysis';
export * from './artifact';
export * from './errors';
export * from './events';
export * from './job';
export * from './label';
export * from './record';
export * from './values';
