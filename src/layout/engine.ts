/**
 * Page Layout Engine — Core Pure Function
 *
 * Flows category blocks down columns, left to right, then onto new pages.
 *
 * Design principles:
 * - PURE FUNCTION: output depends only on the document and the config
 * - Blocks are atomic: a block that does not fit below the cursor moves to
 *   the next column (or page) before any of its lines is drawn
 * - The first block of a column is always drawn there, even if it is taller
 *   than the column; such a block overflows the bottom margin
 * - The title is drawn at the top of every page
 *
 * Fit test height: header line (headerSize * headerLineMultiplier) + header
 * space after + one itemLineHeight per item. The padding after a block is
 * not part of it.
 */

import type { ChecklistDocument } from '../checklist/types/index.js';
import { drawItem } from './bullets.js';
import type { LayoutConfig } from './config.js';
import type { Page } from './types.js';

/** Write position; owned by a single layoutChecklist call */
interface LayoutCursor {
  pageNumber: number;
  column: number;
  x: number;
  y: number;
  /** Nothing drawn in the current column yet */
  pristine: boolean;
}

/** Vertical advance of a category header line */
export function headerAdvance(config: LayoutConfig): number {
  return config.headerSize * config.headerLineMultiplier + config.headerSpaceAfter;
}

/** Height a category block needs to fit in the current column */
export function blockHeight(itemCount: number, config: LayoutConfig): number {
  return headerAdvance(config) + itemCount * config.itemLineHeight;
}

function newPage(pageNumber: number, title: string, config: LayoutConfig): Page {
  return {
    pageNumber,
    primitives: [
      {
        kind: 'text',
        role: 'title',
        text: title,
        x: config.pageWidth / 2,
        y: config.pageHeight - config.margin,
        align: 'center',
        font: config.titleFont,
        size: config.titleSize,
        color: config.titleColor,
      },
    ],
    blocks: [],
  };
}

/**
 * Lays out a checklist into pages of draw primitives.
 *
 * Always returns at least one page; a document without categories yields
 * a single page holding only the title.
 */
export function layoutChecklist(document: ChecklistDocument, config: LayoutConfig): Page[] {
  const columnCount = Math.max(1, Math.floor(document.columnCount));
  const columnWidth = (config.pageWidth - 2 * config.margin) / columnCount;
  const topY = config.pageHeight - config.margin - config.titleOffset;
  const bottomY = config.margin;

  let page = newPage(1, document.title, config);
  const pages: Page[] = [page];

  const cursor: LayoutCursor = {
    pageNumber: 1,
    column: 0,
    x: config.margin,
    y: topY,
    pristine: true,
  };

  for (const category of document.categories) {
    const height = blockHeight(category.items.length, config);

    if (cursor.y - height < bottomY && !cursor.pristine) {
      cursor.column += 1;
      if (cursor.column >= columnCount) {
        cursor.column = 0;
        cursor.pageNumber += 1;
        page = newPage(cursor.pageNumber, document.title, config);
        pages.push(page);
      }
      cursor.x = config.margin + cursor.column * columnWidth;
      cursor.y = topY;
      cursor.pristine = true;
    }

    const top = cursor.y;

    page.primitives.push({
      kind: 'text',
      role: 'header',
      text: category.name,
      x: cursor.x,
      y: cursor.y,
      align: 'left',
      font: config.headerFont,
      size: config.headerSize,
      color: config.headerColor,
    });
    cursor.y -= headerAdvance(config);

    category.items.forEach((item, index) => {
      page.primitives.push(
        ...drawItem(category.bulletStyle, item, index, cursor.x, cursor.y, config),
      );
      cursor.y -= config.itemLineHeight;
    });

    page.blocks.push({
      category: category.name,
      column: cursor.column,
      x: cursor.x,
      top,
      bottom: top - height,
      overflows: top - height < bottomY,
    });

    cursor.y -= config.categoryPadding;
    cursor.pristine = false;
  }

  return pages;
}
