/**
 * Item line drawing, one branch per bullet style.
 */

import type { BulletStyle } from '../checklist/types/index.js';
import type { LayoutConfig } from './config.js';
import type { DrawPrimitive, TextPrimitive } from './types.js';

/** Dot center, relative to the column x and the item baseline */
const DOT_OFFSET_X = 5;
const DOT_OFFSET_Y = -2;
const DOT_RADIUS = 2;

/** Checkbox side as a fraction of the item font size */
const BOX_SCALE = 0.8;
/** Checkbox drop below the baseline, as a fraction of its side */
const BOX_DROP = 0.1;

/** Right edge of "1.", "2.", ... relative to the column x */
const NUMBER_RIGHT_EDGE = 15;

function itemText(
  text: string,
  x: number,
  y: number,
  config: LayoutConfig,
  role: TextPrimitive['role'] = 'item',
  align: TextPrimitive['align'] = 'left',
): TextPrimitive {
  return {
    kind: 'text',
    role,
    text,
    x,
    y,
    align,
    font: config.itemFont,
    size: config.itemSize,
    color: config.itemColor,
  };
}

/**
 * Primitives for one item line with its baseline at y.
 *
 * @param index - 0-based position of the item in its category
 */
export function drawItem(
  style: BulletStyle,
  text: string,
  index: number,
  x: number,
  y: number,
  config: LayoutConfig,
): DrawPrimitive[] {
  const textX = x + config.bulletAreaWidth;

  switch (style.kind) {
    case 'none':
      return [itemText(text, x, y, config)];

    case 'dot':
      return [
        {
          kind: 'circle',
          x: x + DOT_OFFSET_X,
          y: y + DOT_OFFSET_Y,
          radius: DOT_RADIUS,
          fill: config.itemColor,
          stroke: config.itemColor,
        },
        itemText(text, textX, y, config),
      ];

    case 'box': {
      const side = config.itemSize * BOX_SCALE;
      return [
        {
          kind: 'rect',
          x,
          y: y - side * BOX_DROP,
          width: side,
          height: side,
          stroke: config.itemColor,
        },
        itemText(text, textX, y, config),
      ];
    }

    case 'number':
      return [
        itemText(`${index + 1}.`, x + NUMBER_RIGHT_EDGE, y, config, 'bullet', 'right'),
        itemText(text, textX, y, config),
      ];

    case 'glyph':
      return [
        itemText(style.glyph, x, y, config, 'bullet'),
        itemText(text, textX, y, config),
      ];
  }
}
