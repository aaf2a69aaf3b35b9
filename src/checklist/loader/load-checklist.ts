/**
 * Checklist Loader
 *
 * Reads a categorized checklist XML file into a ChecklistDocument.
 *
 * Leniency rules:
 * - Items with empty or missing text are dropped
 * - A category without a name, or with no items left, is skipped silently
 *
 * Failures are returned, not thrown, as a ChecklistLoadError:
 * - NOT_FOUND: source missing or unreadable
 * - FORMAT_ERROR: malformed XML, unexpected structure, bad column count
 * - EMPTY_RESULT: no category survived filtering
 */

import { readFile } from 'node:fs/promises';

import { errorMessage } from '../../errors.js';
import { createLogger } from '../../logger.js';
import { formatBulletStyle, parseBulletStyle } from '../bullet-style.js';
import { ChecklistLoadError } from '../errors.js';
import type { ChecklistLoadErrorCode } from '../errors.js';
import { DEFAULT_TITLE } from '../types/index.js';
import type { ChecklistCategory, ChecklistDocument, ChecklistSchema } from '../types/index.js';
import { parsePositiveInt } from '../utils/numbers.js';
import { getSchemaVariant } from './schema-variants.js';
import { parseXmlTree, textOf } from './xml-tree.js';
import type { CategoryNode } from './xml-tree.js';

const log = createLogger('loader');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LoadOptions {
  /** XML layout to expect (default 'elements') */
  schema?: ChecklistSchema;
  /** Column count fixed outside the document */
  fixedColumnCount?: number;
}

export type LoadResult =
  | {
      ok: true;
      document: ChecklistDocument;
      /** Number of <category> elements dropped by the leniency rules */
      skippedCategories: number;
    }
  | { ok: false; error: ChecklistLoadError };

function failure(code: ChecklistLoadErrorCode, sourcePath: string, message: string): LoadResult {
  return { ok: false, error: new ChecklistLoadError(code, sourcePath, message) };
}

// ---------------------------------------------------------------------------
// Category extraction
// ---------------------------------------------------------------------------

/** Returns null when the category has no name or no non-empty items */
function toCategory(node: CategoryNode): ChecklistCategory | null {
  const name = node['@_name']?.trim() ?? '';
  const items = (node.item ?? []).map(textOf).filter((text) => text !== '');

  if (name === '' || items.length === 0) return null;

  return {
    name,
    bulletStyle: parseBulletStyle(node['@_bullet_style'] ?? node['@_bulletStyle']),
    items,
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parses checklist XML that has already been read.
 *
 * @param sourcePath - Used only in error and log messages
 */
export function parseChecklistXml(
  xml: string,
  sourcePath: string,
  options: LoadOptions = {},
): LoadResult {
  const variant = getSchemaVariant(options.schema ?? 'elements');

  const tree = parseXmlTree(xml);
  if (!tree.ok) {
    return failure('FORMAT_ERROR', sourcePath, `Could not parse '${sourcePath}': ${tree.reason}`);
  }
  const { root } = tree;

  let columnCount = options.fixedColumnCount ?? 1;
  const columnSource = variant.readColumns(root, options.fixedColumnCount);
  if (columnSource) {
    const parsed = parsePositiveInt(columnSource.raw);
    if (parsed === null) {
      return failure(
        'FORMAT_ERROR',
        sourcePath,
        `Could not parse '${sourcePath}': ${columnSource.field} must be a positive integer (got '${columnSource.raw}')`,
      );
    }
    columnCount = parsed;
  }

  const title = variant.readTitle(root) || DEFAULT_TITLE;

  const categoryNodes = root.category ?? [];
  const categories: ChecklistCategory[] = [];
  for (const node of categoryNodes) {
    const category = toCategory(node);
    if (category) {
      categories.push(category);
    } else {
      log.debug('Skipping category without name or items', { name: node['@_name'] ?? null });
    }
  }

  if (categories.length === 0) {
    return failure(
      'EMPTY_RESULT',
      sourcePath,
      `No valid categories found in '${sourcePath}' (${categoryNodes.length} <category> element(s), none with a name and at least one item)`,
    );
  }

  const document: ChecklistDocument = { title, columnCount, categories };

  log.info(`Parsed '${sourcePath}'`, {
    schema: variant.name,
    rootElement: tree.rootName,
    columnCount,
    categories: categories.length,
    skipped: categoryNodes.length - categories.length,
  });
  log.debug('Category bullet styles', {
    styles: categories.map((c) => `${c.name}=${formatBulletStyle(c.bulletStyle) || '(none)'}`),
  });

  return { ok: true, document, skippedCategories: categoryNodes.length - categories.length };
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Reads and parses a checklist XML file.
 *
 * Never throws for expected failures; inspect `result.ok`.
 */
export async function loadChecklist(
  sourcePath: string,
  options: LoadOptions = {},
): Promise<LoadResult> {
  let xml: string;
  try {
    xml = await readFile(sourcePath, 'utf8');
  } catch (err) {
    if (isMissingFileError(err)) {
      return failure('NOT_FOUND', sourcePath, `Input file not found at '${sourcePath}'`);
    }
    return failure(
      'NOT_FOUND',
      sourcePath,
      `Input file at '${sourcePath}' could not be read: ${errorMessage(err)}`,
    );
  }

  return parseChecklistXml(xml, sourcePath, options);
}
