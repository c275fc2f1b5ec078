/**
 * Errors Module
 *
 * Provides:
 * - Conversion error taxonomy with stable codes
 * - One-line error descriptions for console diagnostics
 */

export {
  ConversionError,
  DirectoryNotFoundError,
  NoInputsError,
  EngineUnavailableError,
  RenderError,
  describeError,
  fileKind,
  isConversionError,
  type ConversionErrorCode,
} from './conversion.js';
