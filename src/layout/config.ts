/**
 * Page & Style Configuration
 *
 * The fixed print settings threaded into the layout engine. Defaults match
 * a B6 sheet with small margins, bold dark-blue category headers and plain
 * black items. Overrides are merged over the defaults and validated with Zod.
 *
 * All lengths are PDF points (1/72 inch).
 */

import { StandardFonts } from 'pdf-lib';
import { z } from 'zod';

import { ConfigError } from '../errors.js';

/** Points per inch */
export const INCH = 72;
/** Points per millimetre */
export const MM = INCH / 25.4;

/** B6 sheet, 125 x 176 mm */
export const B6: readonly [number, number] = [125 * MM, 176 * MM];

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const unit = z.number().min(0).max(1);

export const RgbColorSchema = z.object({ r: unit, g: unit, b: unit });

/** Color with components in [0, 1], as pdf-lib's rgb() takes them */
export type RgbColor = z.infer<typeof RgbColorSchema>;

const FontSchema = z.nativeEnum(StandardFonts);

export const LayoutConfigSchema = z
  .object({
    pageWidth: z.number().positive(),
    pageHeight: z.number().positive(),
    margin: z.number().min(0),

    titleFont: FontSchema,
    titleSize: z.number().positive(),
    titleColor: RgbColorSchema,
    /** Gap between the title baseline and the top of the columns */
    titleOffset: z.number().min(0),

    headerFont: FontSchema,
    headerSize: z.number().positive(),
    headerColor: RgbColorSchema,
    headerSpaceAfter: z.number().min(0),
    /** Header line height as a multiple of headerSize */
    headerLineMultiplier: z.number().positive(),

    itemFont: FontSchema,
    itemSize: z.number().positive(),
    itemColor: RgbColorSchema,
    itemLineHeight: z.number().positive(),

    /** Indent reserved for the bullet before item text */
    bulletAreaWidth: z.number().min(0),
    /** Gap after each category block */
    categoryPadding: z.number().min(0),
  })
  .refine((c) => 2 * c.margin < c.pageWidth, {
    message: 'margins leave no printable width',
    path: ['margin'],
  })
  .refine((c) => c.margin + c.titleOffset < c.pageHeight - c.margin, {
    message: 'margins and title offset leave no printable height',
    path: ['titleOffset'],
  });

export type LayoutConfig = z.infer<typeof LayoutConfigSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DARK_BLUE: RgbColor = { r: 0, g: 0, b: 0x8b / 0xff };
export const BLACK: RgbColor = { r: 0, g: 0, b: 0 };

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
  pageWidth: B6[0],
  pageHeight: B6[1],
  margin: 0.2 * INCH,

  titleFont: StandardFonts.HelveticaBold,
  titleSize: 18,
  titleColor: BLACK,
  titleOffset: 0.2 * INCH,

  headerFont: StandardFonts.HelveticaBold,
  headerSize: 8,
  headerColor: DARK_BLUE,
  headerSpaceAfter: 0.05 * INCH,
  headerLineMultiplier: 1.0,

  itemFont: StandardFonts.Helvetica,
  itemSize: 8,
  itemColor: BLACK,
  itemLineHeight: 0.12 * INCH,

  bulletAreaWidth: 0.3 * INCH,
  categoryPadding: 0.2 * INCH,
};

/**
 * Merges overrides over the defaults and validates the result.
 *
 * @throws ConfigError with code INVALID_LAYOUT listing every bad option
 */
export function resolveLayoutConfig(overrides: Partial<LayoutConfig> = {}): LayoutConfig {
  const result = LayoutConfigSchema.safeParse({ ...DEFAULT_LAYOUT_CONFIG, ...overrides });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError('INVALID_LAYOUT', `Invalid layout configuration: ${details}`);
  }
  return result.data;
}
