/**
 * Barrel export for the page layout engine.
 *
 * Primary export: layoutChecklist — the core pure function.
 */

export { layoutChecklist, blockHeight, headerAdvance } from './engine.js';
export { drawItem } from './bullets.js';
export {
  B6,
  BLACK,
  DARK_BLUE,
  DEFAULT_LAYOUT_CONFIG,
  INCH,
  MM,
  resolveLayoutConfig,
} from './config.js';
export type { LayoutConfig, RgbColor } from './config.js';
export type {
  BlockPlacement,
  CirclePrimitive,
  DrawPrimitive,
  Page,
  RectPrimitive,
  TextAlign,
  TextPrimitive,
  TextRole,
} from './types.js';
