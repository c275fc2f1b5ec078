/**
 * Conversion Errors
 *
 * Every failure the converter reports is one of these. The batch driver
 * turns them into a single diagnostic line and a non-zero exit status.
 */

// ============================================================================
// Types
// ============================================================================

export type ConversionErrorCode =
  | 'DIRECTORY_NOT_FOUND'
  | 'NO_INPUTS'
  | 'ENGINE_UNAVAILABLE'
  | 'RENDER_FAILED';

// ============================================================================
// Errors
// ============================================================================

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DirectoryNotFoundError extends ConversionError {
  readonly directory: string;

  constructor(directory: string) {
    super('DIRECTORY_NOT_FOUND', `${directory} directory not found`);
    this.directory = directory;
  }
}

export class NoInputsError extends ConversionError {
  readonly directory: string;
  readonly extension: string;

  constructor(directory: string, extension: string) {
    super('NO_INPUTS', `No ${fileKind(extension)} files found in ${directory} directory`);
    this.directory = directory;
    this.extension = extension;
  }
}

export class EngineUnavailableError extends ConversionError {
  readonly executablePath: string;

  constructor(executablePath: string) {
    super(
      'ENGINE_UNAVAILABLE',
      `Chromium not found at ${executablePath}. Run: npx playwright install chromium`
    );
    this.executablePath = executablePath;
  }
}

export class RenderError extends ConversionError {
  readonly inputPath: string;
  readonly outputPath: string;

  constructor(inputPath: string, outputPath: string, cause: unknown) {
    super('RENDER_FAILED', describeError(cause), { cause });
    this.inputPath = inputPath;
    this.outputPath = outputPath;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * First non-empty line of any thrown value's message
 */
export function describeError(error: unknown): string {
  const text = error instanceof Error ? error.message : String(error);
  const line = text.split('\n').map(l => l.trim()).find(l => l.length > 0);
  return line ?? (error instanceof Error ? error.name : '');
}

/**
 * ".html" -> "HTML"
 */
export function fileKind(extension: string): string {
  return extension.replace(/^\./, '').toUpperCase();
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
