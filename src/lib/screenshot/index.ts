/**
 * Screenshot Module
 *
 * Provides:
 * - Playwright-based HTML to JPEG rendering
 * - Network idle detection with a bounded wait
 * - Browser binary preflight check
 */

export {
  DiagramRenderer,
  createDiagramRenderer,
  launchChromium,
  type RenderPage,
  type RenderBrowser,
  type BrowserLauncher,
  type RendererOptions,
  type RenderResult,
} from './capture.js';
