/**
 * Domain model exports.
 */

export * from './archive';
export * from './asset';
export * from './errors';
export * from './events';
export * from './lifecycle';
