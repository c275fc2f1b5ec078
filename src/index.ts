/**
 * diagram-snap - HTML diagram to JPEG conversion
 *
 * Renders local HTML diagrams in headless Chromium and saves
 * full-page JPEG screenshots next to them.
 */

export * from './lib/config/index.js';
export * from './lib/errors/index.js';
export * from './lib/logging/index.js';
export * from './lib/discovery/index.js';
export * from './lib/screenshot/index.js';
export * from './lib/batch/index.js';

// Version
export const VERSION = '0.1.0';
