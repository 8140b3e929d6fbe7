/**
 * Text Measurement
 *
 * Width of a string rendered in one of the menu text styles. The sizing
 * engine only sees the TextMeasurer interface so tests can supply exact
 * widths.
 */

import { MENU_FONTS, type MenuTextStyle } from './constants';
import { measureLogger } from '../../services/logger.service';

export interface TextMeasurer {
  measure(text: string, style: MenuTextStyle): number;
}

/** Average advance of a glyph relative to the font size */
const AVERAGE_GLYPH_WIDTH_RATIO = 0.55;

/**
 * Rough width used when no canvas is available (headless DOMs).
 */
export function estimateTextWidth(text: string, style: MenuTextStyle): number {
  return text.length * MENU_FONTS[style].size * AVERAGE_GLYPH_WIDTH_RATIO;
}

/**
 * Measurer backed by a 2D canvas context, with a per-measurer cache.
 */
export function createCanvasTextMeasurer(doc: Document = document): TextMeasurer {
  let context: CanvasRenderingContext2D | null | undefined;
  const cache = new Map<string, number>();

  const getContext = (): CanvasRenderingContext2D | null => {
    if (context === undefined) {
      context = doc.createElement('canvas').getContext('2d');
      if (!context) {
        measureLogger.debug('Canvas 2D context unavailable, estimating text widths');
      }
    }
    return context;
  };

  return {
    measure(text, style) {
      const key = `${style}:${text}`;
      const cached = cache.get(key);
      if (cached !== undefined) {
        return cached;
      }

      const ctx = getContext();
      let width: number;
      if (ctx) {
        ctx.font = MENU_FONTS[style].css;
        width = ctx.measureText(text).width;
      } else {
        width = estimateTextWidth(text, style);
      }

      cache.set(key, width);
      return width;
    },
  };
}

let sharedMeasurer: TextMeasurer | null = null;

export function getDefaultTextMeasurer(): TextMeasurer {
  if (!sharedMeasurer) {
    sharedMeasurer = createCanvasTextMeasurer();
  }
  return sharedMeasurer;
}
