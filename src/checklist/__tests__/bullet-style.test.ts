/**
 * Tests for bullet style tag parsing
 */

import { describe, it, expect } from 'vitest';

import { formatBulletStyle, parseBulletStyle } from '../bullet-style.js';

describe('parseBulletStyle', () => {
  it('maps a missing or blank tag to none', () => {
    expect(parseBulletStyle(undefined)).toEqual({ kind: 'none' });
    expect(parseBulletStyle('')).toEqual({ kind: 'none' });
    expect(parseBulletStyle('  ')).toEqual({ kind: 'none' });
  });

  it('recognizes named styles regardless of case and padding', () => {
    expect(parseBulletStyle('dot')).toEqual({ kind: 'dot' });
    expect(parseBulletStyle(' Box ')).toEqual({ kind: 'box' });
    expect(parseBulletStyle('NUMBER')).toEqual({ kind: 'number' });
  });

  it('keeps any other tag as a literal glyph', () => {
    expect(parseBulletStyle('-')).toEqual({ kind: 'glyph', glyph: '-' });
    expect(parseBulletStyle('*')).toEqual({ kind: 'glyph', glyph: '*' });
    expect(parseBulletStyle(' >> ')).toEqual({ kind: 'glyph', glyph: '>>' });
  });

  it('does not treat "none" as a named style', () => {
    expect(parseBulletStyle('none')).toEqual({ kind: 'glyph', glyph: 'none' });
  });
});

describe('formatBulletStyle', () => {
  it('formats each kind back to its tag', () => {
    expect(formatBulletStyle({ kind: 'none' })).toBe('');
    expect(formatBulletStyle({ kind: 'dot' })).toBe('dot');
    expect(formatBulletStyle({ kind: 'box' })).toBe('box');
    expect(formatBulletStyle({ kind: 'number' })).toBe('number');
    expect(formatBulletStyle({ kind: 'glyph', glyph: '*' })).toBe('*');
  });
});
