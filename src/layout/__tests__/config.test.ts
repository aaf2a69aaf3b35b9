/**
 * Tests for page & style configuration defaults and overrides
 */

import { describe, it, expect } from 'vitest';
import { StandardFonts } from 'pdf-lib';

import { ConfigError } from '../../errors.js';
import { DARK_BLUE, DEFAULT_LAYOUT_CONFIG, INCH, resolveLayoutConfig } from '../config.js';

describe('DEFAULT_LAYOUT_CONFIG', () => {
  it('describes a B6 page with 0.2 inch margins', () => {
    expect(DEFAULT_LAYOUT_CONFIG.pageWidth).toBeCloseTo(354.33, 2);
    expect(DEFAULT_LAYOUT_CONFIG.pageHeight).toBeCloseTo(498.9, 2);
    expect(DEFAULT_LAYOUT_CONFIG.margin).toBeCloseTo(14.4);
  });

  it('uses bold dark-blue headers and plain black items', () => {
    expect(DEFAULT_LAYOUT_CONFIG.headerFont).toBe(StandardFonts.HelveticaBold);
    expect(DEFAULT_LAYOUT_CONFIG.headerColor).toEqual(DARK_BLUE);
    expect(DEFAULT_LAYOUT_CONFIG.itemFont).toBe(StandardFonts.Helvetica);
    expect(DEFAULT_LAYOUT_CONFIG.itemColor).toEqual({ r: 0, g: 0, b: 0 });
    expect(DEFAULT_LAYOUT_CONFIG.itemLineHeight).toBeCloseTo(0.12 * INCH);
  });
});

describe('resolveLayoutConfig', () => {
  it('returns the defaults when given no overrides', () => {
    expect(resolveLayoutConfig()).toEqual(DEFAULT_LAYOUT_CONFIG);
  });

  it('merges overrides over the defaults', () => {
    const config = resolveLayoutConfig({ pageWidth: 300, itemFont: StandardFonts.Courier });

    expect(config.pageWidth).toBe(300);
    expect(config.itemFont).toBe(StandardFonts.Courier);
    expect(config.headerSize).toBe(DEFAULT_LAYOUT_CONFIG.headerSize);
  });

  it('rejects margins wider than the page', () => {
    expect(() => resolveLayoutConfig({ pageWidth: 100, margin: 50 })).toThrow(
      'Invalid layout configuration: margin: margins leave no printable width',
    );
  });

  it('rejects a title offset that leaves no room for columns', () => {
    expect(() => resolveLayoutConfig({ pageHeight: 100, margin: 10, titleOffset: 80 })).toThrow(
      ConfigError,
    );
  });

  it('rejects non-positive sizes and out-of-range colors', () => {
    try {
      resolveLayoutConfig({ itemSize: 0, headerColor: { r: 2, g: 0, b: 0 } });
      expect.unreachable('resolveLayoutConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect((err as ConfigError).code).toBe('INVALID_LAYOUT');
      expect((err as ConfigError).message).toMatch(/itemSize/);
      expect((err as ConfigError).message).toMatch(/headerColor\.r/);
    }
  });
});
