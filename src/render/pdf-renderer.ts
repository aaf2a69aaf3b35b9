/**
 * PDF Renderer Module
 *
 * Turns laid-out pages into a PDF with pdf-lib and writes it to disk.
 *
 * No native dependencies -- uses pdf-lib (pure JavaScript) with the 14
 * standard fonts, so text is limited to what WinAnsi encoding can represent.
 *
 * Inputs: Page[] from the layout engine + page size and document title
 * Outputs: PDF bytes (renderPdf) or a file on disk (savePdf)
 * Errors: ChecklistRenderError with typed code property
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { PDFDocument, rgb } from 'pdf-lib';
import type { PDFFont, PDFPage, StandardFonts } from 'pdf-lib';

import { errorMessage } from '../errors.js';
import type { RgbColor } from '../layout/config.js';
import type { DrawPrimitive, Page, TextPrimitive } from '../layout/types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RenderOptions {
  /** Stored in the PDF metadata */
  title: string;
  pageWidth: number;
  pageHeight: number;
}

/** Error codes for render and output failures */
export type ChecklistRenderErrorCode = 'NO_PAGES' | 'RENDER_FAILED' | 'WRITE_FAILED';

/** Typed error for render and output failures */
export class ChecklistRenderError extends Error {
  readonly code: ChecklistRenderErrorCode;

  constructor(code: ChecklistRenderErrorCode, message: string) {
    super(message);
    this.name = 'ChecklistRenderError';
    this.code = code;
  }
}

export const PDF_CREATOR = 'checklist-printer';

// ---------------------------------------------------------------------------
// Drawing
// ---------------------------------------------------------------------------

/** Line width for stroked shapes, in points */
const STROKE_WIDTH = 1;

const toRgb = (color: RgbColor) => rgb(color.r, color.g, color.b);

/** Left edge of a text primitive once its alignment is applied */
export function alignedX(primitive: TextPrimitive, font: PDFFont): number {
  if (primitive.align === 'left') return primitive.x;
  const width = font.widthOfTextAtSize(primitive.text, primitive.size);
  return primitive.align === 'center' ? primitive.x - width / 2 : primitive.x - width;
}

function drawPrimitive(
  pdfPage: PDFPage,
  primitive: DrawPrimitive,
  fontFor: (name: StandardFonts) => PDFFont,
): void {
  switch (primitive.kind) {
    case 'text': {
      const font = fontFor(primitive.font);
      pdfPage.drawText(primitive.text, {
        x: alignedX(primitive, font),
        y: primitive.y,
        size: primitive.size,
        font,
        color: toRgb(primitive.color),
      });
      return;
    }

    case 'circle':
      pdfPage.drawCircle({
        x: primitive.x,
        y: primitive.y,
        size: primitive.radius,
        ...(primitive.fill ? { color: toRgb(primitive.fill) } : {}),
        ...(primitive.stroke
          ? { borderColor: toRgb(primitive.stroke), borderWidth: STROKE_WIDTH }
          : {}),
      });
      return;

    case 'rect':
      pdfPage.drawRectangle({
        x: primitive.x,
        y: primitive.y,
        width: primitive.width,
        height: primitive.height,
        borderColor: toRgb(primitive.stroke),
        borderWidth: STROKE_WIDTH,
      });
      return;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Renders pages to PDF bytes.
 *
 * Each standard font is embedded once, on first use.
 *
 * @throws ChecklistRenderError NO_PAGES for an empty page list,
 *   RENDER_FAILED when pdf-lib rejects a primitive (e.g. a glyph outside WinAnsi)
 */
export async function renderPdf(
  pages: readonly Page[],
  options: RenderOptions,
): Promise<Uint8Array> {
  if (pages.length === 0) {
    throw new ChecklistRenderError('NO_PAGES', 'Nothing to render: layout produced no pages');
  }

  try {
    const pdfDoc = await PDFDocument.create();
    pdfDoc.setTitle(options.title);
    pdfDoc.setCreator(PDF_CREATOR);

    const fonts = new Map<StandardFonts, PDFFont>();
    for (const page of pages) {
      for (const primitive of page.primitives) {
        if (primitive.kind === 'text' && !fonts.has(primitive.font)) {
          fonts.set(primitive.font, await pdfDoc.embedFont(primitive.font));
        }
      }
    }
    const fontFor = (name: StandardFonts): PDFFont => {
      const font = fonts.get(name);
      if (!font) {
        throw new ChecklistRenderError('RENDER_FAILED', `Font ${name} was not embedded`);
      }
      return font;
    };

    for (const page of pages) {
      const pdfPage = pdfDoc.addPage([options.pageWidth, options.pageHeight]);
      for (const primitive of page.primitives) {
        drawPrimitive(pdfPage, primitive, fontFor);
      }
    }

    return await pdfDoc.save();
  } catch (err) {
    if (err instanceof ChecklistRenderError) {
      throw err;
    }
    throw new ChecklistRenderError('RENDER_FAILED', `Failed to render PDF: ${errorMessage(err)}`);
  }
}

/**
 * Writes PDF bytes to outputPath, creating missing parent directories.
 *
 * @throws ChecklistRenderError WRITE_FAILED
 */
export async function savePdf(outputPath: string, bytes: Uint8Array): Promise<void> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, bytes);
  } catch (err) {
    throw new ChecklistRenderError(
      'WRITE_FAILED',
      `Could not write '${outputPath}': ${errorMessage(err)}`,
    );
  }
}
