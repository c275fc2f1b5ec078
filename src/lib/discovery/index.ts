/**
 * Discovery Module
 *
 * Provides:
 * - Sorted listing of diagram files in a directory
 * - Output path derivation
 */

export {
  discoverInputs,
  deriveOutputPath,
  type InputFile,
  type DiscoveryOptions,
} from './scanner.js';
