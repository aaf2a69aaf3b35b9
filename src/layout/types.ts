/**
 * Layout Output Type Definitions
 *
 * The layout engine produces pages of positioned draw primitives in PDF
 * coordinates (origin bottom-left, y grows upwards). Primitives carry no
 * renderer objects, so a page can be inspected or rendered by anything.
 */

import type { StandardFonts } from 'pdf-lib';

import type { RgbColor } from './config.js';

/** Horizontal anchor of a text primitive relative to its x */
export type TextAlign = 'left' | 'center' | 'right';

/** What a text primitive is part of */
export type TextRole = 'title' | 'header' | 'bullet' | 'item';

export interface TextPrimitive {
  kind: 'text';
  role: TextRole;
  text: string;
  /** Anchor x; the renderer offsets by the text width for center/right */
  x: number;
  /** Baseline y */
  y: number;
  align: TextAlign;
  font: StandardFonts;
  size: number;
  color: RgbColor;
}

export interface CirclePrimitive {
  kind: 'circle';
  /** Center */
  x: number;
  y: number;
  radius: number;
  fill: RgbColor | null;
  stroke: RgbColor | null;
}

export interface RectPrimitive {
  kind: 'rect';
  /** Bottom-left corner */
  x: number;
  y: number;
  width: number;
  height: number;
  stroke: RgbColor;
}

export type DrawPrimitive = TextPrimitive | CirclePrimitive | RectPrimitive;

/** Where a category block landed */
export interface BlockPlacement {
  category: string;
  /** 0-based column index on its page */
  column: number;
  x: number;
  /** Header baseline */
  top: number;
  /** top minus the block height used in the fit test */
  bottom: number;
  /** True when the block crosses the bottom margin (taller than a whole column) */
  overflows: boolean;
}

export interface Page {
  /** 1-based */
  pageNumber: number;
  primitives: DrawPrimitive[];
  blocks: BlockPlacement[];
}
