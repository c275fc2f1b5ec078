/**
 * Batch Module
 *
 * Provides:
 * - Sequential, fail-fast conversion of a diagram directory
 * - Exit status for the CLI
 */

export {
  BatchConverter,
  createBatchConverter,
  type Renderer,
  type BatchOptions,
  type BatchResult,
} from './driver.js';
