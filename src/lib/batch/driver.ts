/**
 * Batch Converter
 *
 * Discovers the diagrams, then renders them one at a time in discovery
 * order. The first failure stops the run; outputs already written stay.
 */

import { basename } from 'path';
import { DEFAULT_CONFIG, type Viewport } from '../config/index.js';
import { discoverInputs, deriveOutputPath, type InputFile } from '../discovery/index.js';
import {
  DirectoryNotFoundError,
  EngineUnavailableError,
  NoInputsError,
  RenderError,
  fileKind,
  type ConversionError,
} from '../errors/index.js';
import { createConsoleLogger, type Logger } from '../logging/index.js';
import { createDiagramRenderer, type DiagramRenderer, type RenderResult } from '../screenshot/index.js';

// ============================================================================
// Types
// ============================================================================

export type Renderer = Pick<DiagramRenderer, 'preflight' | 'render'>;

export interface BatchOptions {
  /** Directory holding the diagrams (default: diagrams) */
  inputDir?: string;
  /** Source extension (default: .html) */
  extension?: string;
  /** Output extension (default: .jpg) */
  outputExtension?: string;
  /** Viewport for every render (default: 1920x2000) */
  viewport?: Viewport;
  renderer?: Renderer;
  logger?: Logger;
}

export interface BatchResult {
  /** Process exit status: 0 when every file converted */
  exitCode: 0 | 1;
  found: InputFile[];
  converted: RenderResult[];
  /** The error that stopped the run */
  error?: ConversionError;
}

// ============================================================================
// Batch Converter
// ============================================================================

export class BatchConverter {
  private options: Required<Omit<BatchOptions, 'renderer' | 'logger'>>;
  private renderer: Renderer;
  private logger: Logger;

  constructor(options: BatchOptions = {}) {
    this.options = {
      inputDir: options.inputDir ?? DEFAULT_CONFIG.inputDir,
      extension: options.extension ?? DEFAULT_CONFIG.extension,
      outputExtension: options.outputExtension ?? DEFAULT_CONFIG.outputExtension,
      viewport: { ...(options.viewport ?? DEFAULT_CONFIG.render.viewport) },
    };
    this.logger = options.logger ?? createConsoleLogger();
    this.renderer = options.renderer ?? createDiagramRenderer({ logger: this.logger });
  }

  async run(): Promise<BatchResult> {
    const { inputDir, extension, outputExtension, viewport } = this.options;
    const result: BatchResult = { exitCode: 1, found: [], converted: [] };

    try {
      result.found = await discoverInputs(inputDir, { extension });
    } catch (error) {
      if (error instanceof DirectoryNotFoundError) {
        this.logger.error(`Error: ${error.message}`);
        return { ...result, error };
      }
      if (error instanceof NoInputsError) {
        this.logger.error(error.message);
        return { ...result, error };
      }
      throw error;
    }

    this.logger.info(`Found ${result.found.length} ${fileKind(extension)} file(s) to convert...`);

    try {
      await this.renderer.preflight();
    } catch (error) {
      if (error instanceof EngineUnavailableError) {
        this.logger.error(`Error: ${error.message}`);
        return { ...result, error };
      }
      throw error;
    }

    for (const input of result.found) {
      const outputPath = deriveOutputPath(input.path, outputExtension);
      this.logger.info(`Converting ${input.name}...`);

      try {
        const rendered = await this.renderer.render(input.path, outputPath, viewport);
        result.converted.push(rendered);
        this.logger.info(`Converted: ${input.name} -> ${basename(outputPath)}`);
      } catch (error) {
        if (error instanceof RenderError) {
          this.logger.error(`Error converting ${input.name}: ${error.message}`);
          return { ...result, error };
        }
        throw error;
      }
    }

    this.logger.info('All conversions completed successfully!');
    return { ...result, exitCode: 0 };
  }

  /**
   * Get current options
   */
  getOptions(): Required<Omit<BatchOptions, 'renderer' | 'logger'>> {
    return { ...this.options, viewport: { ...this.options.viewport } };
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createBatchConverter(options?: BatchOptions): BatchConverter {
  return new BatchConverter(options);
}
