/**
 * Dojo trainer engine: aligns a video playback clock with an input stream,
 * records sessions and scores them against authored patterns.
 */

export * from './model.js';
export * from './errors.js';
export * from './config.js';
export * from './clock/index.js';
export * from './recorder/index.js';
export * from './pattern/index.js';
export * from './matching/index.js';
export * from './scoring/index.js';
export * from './session/index.js';
export * from './util/index.js';
