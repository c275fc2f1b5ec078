/**
 * Config Module
 *
 * Provides:
 * - Built-in converter and render defaults
 * - Zod-validated viewport check
 */

export {
  DEFAULT_CONFIG,
  DEFAULT_VIEWPORT,
  ViewportSchema,
  isValidViewport,
  type Viewport,
  type RenderConfig,
  type ConverterConfig,
} from './defaults.js';
