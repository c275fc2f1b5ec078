/**
 * Converter Defaults
 *
 * The run is not configurable: the CLI always uses DEFAULT_CONFIG.
 * ViewportSchema guards viewports handed to the renderer by library callers.
 */

import { z } from 'zod';

// ============================================================================
// Schemas
// ============================================================================

export const ViewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

// ============================================================================
// Types
// ============================================================================

export type Viewport = z.infer<typeof ViewportSchema>;

export interface RenderConfig {
  viewport: Viewport;
  /** JPEG quality (0-100) */
  quality: number;
  /** Bound on navigation and the network-idle wait, in ms */
  timeout: number;
}

export interface ConverterConfig {
  inputDir: string;
  extension: string;
  outputExtension: string;
  render: RenderConfig;
}

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_VIEWPORT: Readonly<Viewport> = Object.freeze({ width: 1920, height: 2000 });

export const DEFAULT_CONFIG: ConverterConfig = {
  inputDir: 'diagrams',
  extension: '.html',
  outputExtension: '.jpg',
  render: {
    viewport: DEFAULT_VIEWPORT,
    quality: 80,
    timeout: 30000,
  },
};

/**
 * Positive integer width and height
 */
export function isValidViewport(viewport: Viewport): boolean {
  return ViewportSchema.safeParse(viewport).success;
}
