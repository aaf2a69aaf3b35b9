/**
 * Checklist Document Type Definitions
 *
 * Defines the in-memory model produced by the loader and consumed by the
 * layout engine:
 * - ChecklistDocument: title, column count and ordered categories
 * - ChecklistCategory: a named block of items sharing one bullet style
 * - BulletStyle: tagged union of the supported item markers
 *
 * Documents are read-only once loaded.
 */

// ---------------------------------------------------------------------------
// Bullet Styles
// ---------------------------------------------------------------------------

/** Bullet kinds with a dedicated rendering */
export type BulletKind = 'none' | 'dot' | 'box' | 'number';

/**
 * Marker drawn before each item of a category.
 *
 * - none: item text flush with the column, no indent reserved
 * - dot: small filled circle
 * - box: outline square (checkbox)
 * - number: right-aligned "1.", "2.", ...
 * - glyph: any other tag, drawn verbatim (e.g. "-", "*")
 */
export type BulletStyle =
  | { readonly kind: BulletKind }
  | { readonly kind: 'glyph'; readonly glyph: string };

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

export interface ChecklistCategory {
  /** Header text, never empty */
  readonly name: string;
  readonly bulletStyle: BulletStyle;
  /** Item texts in document order, never empty */
  readonly items: readonly string[];
}

export interface ChecklistDocument {
  readonly title: string;
  /** Number of columns per page, at least 1 */
  readonly columnCount: number;
  readonly categories: readonly ChecklistCategory[];
}

// ---------------------------------------------------------------------------
// Source Schema Variants
// ---------------------------------------------------------------------------

/**
 * XML layouts the loader understands.
 *
 * - elements: <title> and <columns> are child elements of the root
 * - attributes: title is a root attribute; the column count is fixed by the caller
 */
export const CHECKLIST_SCHEMAS = ['elements', 'attributes'] as const;

export type ChecklistSchema = typeof CHECKLIST_SCHEMAS[number];

export function isChecklistSchema(value: string): value is ChecklistSchema {
  return (CHECKLIST_SCHEMAS as readonly string[]).includes(value);
}

/** Title used when the source does not provide one */
export const DEFAULT_TITLE = 'Checklist';
