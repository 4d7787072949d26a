/**
 * Barrel export for all model interfaces.
 */

export * from './document.js';
export * from './layout.js';
export * from './extraction.js';
