/**
 * Core type definitions
 */

export * from './errors';
export * from './result';
export * from './library';
export * from './playback';
export * from './state';
export * from './events';
