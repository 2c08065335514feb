/**
 * Focusboard SDK
 *
 * Typed API client, framework layouts and a board view-model for building
 * Focusboard front ends.
 *
 * @packageDocumentation
 */

// Client
export * from './client/index.js';

// Frameworks
export * from './frameworks/index.js';

// Board
export * from './board/index.js';

// Version
export const VERSION = '0.1.0' as const;
