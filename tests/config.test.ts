/**
 * Converter Defaults Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  DEFAULT_VIEWPORT,
  ViewportSchema,
  isValidViewport,
} from '../src/lib/config/index.js';

describe('DEFAULT_CONFIG', () => {
  it('should have all expected defaults', () => {
    expect(DEFAULT_CONFIG).toEqual({
      inputDir: 'diagrams',
      extension: '.html',
      outputExtension: '.jpg',
      render: {
        viewport: { width: 1920, height: 2000 },
        quality: 80,
        timeout: 30000,
      },
    });
  });

  it('should freeze the default viewport', () => {
    expect(Object.isFrozen(DEFAULT_VIEWPORT)).toBe(true);
  });
});

describe('isValidViewport', () => {
  it('should accept positive integers', () => {
    expect(isValidViewport({ width: 1920, height: 2000 })).toBe(true);
  });

  it('should reject zero and negative sizes', () => {
    expect(isValidViewport({ width: 0, height: 2000 })).toBe(false);
    expect(isValidViewport({ width: 1920, height: -1 })).toBe(false);
  });

  it('should reject fractional sizes', () => {
    expect(isValidViewport({ width: 10.5, height: 20 })).toBe(false);
  });

  it('should report the failing field', () => {
    const parsed = ViewportSchema.safeParse({ width: 800, height: 0 });

    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    expect(parsed.error.issues[0].path).toEqual(['height']);
  });
});
