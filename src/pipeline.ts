/**
 * Checklist PDF Pipeline
 *
 * load -> layout -> render -> write, in that order, once per call.
 * Nothing is written unless every earlier step succeeded.
 */

import { loadChecklist } from './checklist/loader/index.js';
import type { ChecklistSchema } from './checklist/types/index.js';
import { layoutChecklist, resolveLayoutConfig } from './layout/index.js';
import type { LayoutConfig } from './layout/index.js';
import { createLogger } from './logger.js';
import { renderPdf, savePdf } from './render/index.js';

const log = createLogger('checklist');

export interface GenerateOptions {
  inputPath: string;
  outputPath: string;
  schema?: ChecklistSchema;
  fixedColumnCount?: number;
  /** Overrides merged over DEFAULT_LAYOUT_CONFIG */
  layout?: Partial<LayoutConfig>;
}

export interface GenerateResult {
  outputPath: string;
  title: string;
  columnCount: number;
  pageCount: number;
  categoryCount: number;
  itemCount: number;
  /** Categories drawn past the bottom margin because they exceed a column */
  overflowingCategories: string[];
}

/**
 * Generates the checklist PDF described by options.
 *
 * @throws ConfigError for invalid layout overrides
 * @throws ChecklistLoadError when the source is missing, malformed or empty
 * @throws ChecklistRenderError when rendering or writing fails
 */
export async function generateChecklistPdf(options: GenerateOptions): Promise<GenerateResult> {
  const config = resolveLayoutConfig(options.layout);

  const loaded = await loadChecklist(options.inputPath, {
    schema: options.schema,
    fixedColumnCount: options.fixedColumnCount,
  });
  if (!loaded.ok) {
    throw loaded.error;
  }
  const { document } = loaded;

  const pages = layoutChecklist(document, config);
  const overflowingCategories = pages.flatMap((page) =>
    page.blocks.filter((block) => block.overflows).map((block) => block.category),
  );
  for (const category of overflowingCategories) {
    log.warn('Category is taller than a column and runs past the bottom margin', { category });
  }
  log.debug('Layout complete', {
    pages: pages.length,
    placements: pages.flatMap((page) =>
      page.blocks.map((block) => `p${page.pageNumber}c${block.column}:${block.category}`),
    ),
  });

  const bytes = await renderPdf(pages, {
    title: document.title,
    pageWidth: config.pageWidth,
    pageHeight: config.pageHeight,
  });
  await savePdf(options.outputPath, bytes);

  return {
    outputPath: options.outputPath,
    title: document.title,
    columnCount: document.columnCount,
    pageCount: pages.length,
    categoryCount: document.categories.length,
    itemCount: document.categories.reduce((sum, category) => sum + category.items.length, 0),
    overflowingCategories,
  };
}
