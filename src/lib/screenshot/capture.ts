/**
 * Diagram Renderer
 *
 * Uses Playwright to render one local HTML file and capture it as a
 * full-page JPEG. Each render gets its own browser, which is closed on
 * every path before the call returns or throws.
 */

import { chromium } from 'playwright';
import { access, mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { pathToFileURL } from 'url';
import { DEFAULT_CONFIG, isValidViewport, type Viewport } from '../config/index.js';
import {
  EngineUnavailableError,
  RenderError,
  describeError,
} from '../errors/index.js';
import { createConsoleLogger, type Logger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * The slice of a Playwright page the renderer drives
 */
export interface RenderPage {
  goto(url: string, options: { timeout: number; waitUntil: 'load' }): Promise<unknown>;
  waitForLoadState(state: 'networkidle', options: { timeout: number }): Promise<void>;
  screenshot(options: { type: 'jpeg'; fullPage: true; quality: number }): Promise<Buffer>;
  close(): Promise<void>;
}

/**
 * The slice of a Playwright browser the renderer drives
 */
export interface RenderBrowser {
  newPage(options: { viewport: Viewport }): Promise<RenderPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<RenderBrowser>;

export interface RendererOptions {
  /** Default viewport */
  viewport?: Viewport;
  /** JPEG quality (0-100) */
  quality?: number;
  /** Bound on navigation and the network-idle wait, in ms */
  timeout?: number;
  /** Browser factory (default: headless Chromium) */
  launcher?: BrowserLauncher;
  /** Location of the browser binary checked by preflight() */
  executablePath?: () => string;
  logger?: Logger;
}

export interface RenderResult {
  inputPath: string;
  outputPath: string;
  /** Size of the written JPEG */
  bytes: number;
  durationMs: number;
}

export const launchChromium: BrowserLauncher = () => chromium.launch({ headless: true });

// ============================================================================
// Diagram Renderer
// ============================================================================

export class DiagramRenderer {
  private options: Required<Omit<RendererOptions, 'logger'>>;
  private logger: Logger;

  constructor(options: RendererOptions = {}) {
    const defaults = DEFAULT_CONFIG.render;
    this.options = {
      viewport: { ...(options.viewport ?? defaults.viewport) },
      quality: options.quality ?? defaults.quality,
      timeout: options.timeout ?? defaults.timeout,
      launcher: options.launcher ?? launchChromium,
      executablePath: options.executablePath ?? (() => chromium.executablePath()),
    };
    this.logger = options.logger ?? createConsoleLogger({ prefix: '[Render]' });
  }

  /**
   * Fail early when the browser binary is not installed
   */
  async preflight(): Promise<void> {
    const path = this.options.executablePath();
    try {
      await access(path);
    } catch {
      throw new EngineUnavailableError(path);
    }
  }

  /**
   * Render one HTML file to a JPEG at outputPath
   */
  async render(
    inputPath: string,
    outputPath: string,
    viewport: Viewport = this.options.viewport
  ): Promise<RenderResult> {
    const input = resolve(inputPath);
    const output = resolve(outputPath);
    const startTime = Date.now();

    try {
      if (!isValidViewport(viewport)) {
        throw new Error(`Invalid viewport ${viewport.width}x${viewport.height}`);
      }

      await mkdir(dirname(output), { recursive: true });
      const bytes = await this.capture(pathToFileURL(input).href, output, viewport);

      return {
        inputPath: input,
        outputPath: output,
        bytes,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      throw new RenderError(input, output, error);
    }
  }

  /**
   * Get current options
   */
  getOptions(): Required<Omit<RendererOptions, 'logger'>> {
    return { ...this.options, viewport: { ...this.options.viewport } };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async capture(url: string, output: string, viewport: Viewport): Promise<number> {
    const { timeout, quality } = this.options;
    const browser = await this.options.launcher();

    try {
      const page = await browser.newPage({
        viewport: { width: viewport.width, height: viewport.height },
      });

      try {
        await page.goto(url, { timeout, waitUntil: 'load' });
        await page.waitForLoadState('networkidle', { timeout });

        const image = await page.screenshot({ type: 'jpeg', fullPage: true, quality });
        if (image.length === 0) {
          throw new Error('Screenshot produced no image data');
        }

        await writeFile(output, image);
        return image.length;
      } finally {
        await this.release('page', () => page.close());
      }
    } finally {
      await this.release('browser', () => browser.close());
    }
  }

  /**
   * Close a resource; a close failure is logged so it cannot mask the render error
   */
  private async release(what: string, close: () => Promise<void>): Promise<void> {
    try {
      await close();
    } catch (error) {
      this.logger.error(`Failed to close ${what}: ${describeError(error)}`);
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createDiagramRenderer(options?: RendererOptions): DiagramRenderer {
  return new DiagramRenderer(options);
}
