/**
 * Shared test helpers: deterministic text widths and element rects.
 */

import { vi } from 'vitest';
import type { TextMeasurer } from '../components/PressMenu/textMeasure';
import type { MenuTextStyle } from '../components/PressMenu/constants';

/** Width of one character per text style */
export const CHAR_WIDTHS: Record<MenuTextStyle, number> = {
  title: 8,
  status: 8.5,
  detail: 9,
};

export const charWidthMeasurer: TextMeasurer = {
  measure: (text, style) => text.length * CHAR_WIDTHS[style],
};

export interface RectLike {
  left: number;
  top: number;
  width?: number;
  height?: number;
}

export function toDOMRect({ left, top, width = 0, height = 0 }: RectLike): DOMRect {
  return {
    x: left,
    y: top,
    left,
    top,
    width,
    height,
    right: left + width,
    bottom: top + height,
    toJSON: () => ({ left, top, width, height }),
  };
}

/**
 * Give every element a bounding rect; elements `resolve` skips sit at the origin.
 */
export function mockBoundingRects(resolve: (element: Element) => RectLike | undefined) {
  return vi
    .spyOn(Element.prototype, 'getBoundingClientRect')
    .mockImplementation(function (this: Element) {
      return toDOMRect(resolve(this) ?? { left: 0, top: 0 });
    });
}
