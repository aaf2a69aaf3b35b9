/**
 * Bullet style tag parsing.
 *
 * Maps the free-form `bullet_style` attribute onto the BulletStyle union.
 * Recognized tags are matched case-insensitively after trimming; anything
 * else is kept verbatim as a literal glyph.
 */

import type { BulletKind, BulletStyle } from './types/index.js';

const NAMED_STYLES: ReadonlyMap<string, BulletKind> = new Map([
  ['dot', 'dot'],
  ['box', 'box'],
  ['number', 'number'],
]);

export function parseBulletStyle(tag: string | undefined): BulletStyle {
  const trimmed = tag?.trim() ?? '';
  if (trimmed === '') return { kind: 'none' };

  const named = NAMED_STYLES.get(trimmed.toLowerCase());
  if (named) return { kind: named };

  return { kind: 'glyph', glyph: trimmed };
}

/** Inverse of parseBulletStyle, for logging and round-tripping */
export function formatBulletStyle(style: BulletStyle): string {
  switch (style.kind) {
    case 'none':
      return '';
    case 'glyph':
      return style.glyph;
    default:
      return style.kind;
  }
}
