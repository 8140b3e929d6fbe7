/**
 * Press Menu Constants
 *
 * Row metrics and text styles shared by the sizing engine and the rendered
 * rows. The overlay applies them as inline styles; keep PressMenuOverlay.css
 * free of sizes.
 */

import type { MenuBadge } from './types';

// =============================================================================
// Row Metrics
// =============================================================================

/** Leading + trailing row inset */
export const ROW_HORIZONTAL_PADDING = 24;
/** Top + bottom row inset */
export const ROW_VERTICAL_PADDING = 24;
export const ROW_MIN_HEIGHT = 44;
/** Gap between the badge and the row content */
export const ROW_SPACING = 12;
/** Gap between title, spacer, status and detail */
export const CONTENT_SPACING = 4;
export const BADGE_SIZE = 24;
export const SEPARATOR_HEIGHT = 0.3;

// =============================================================================
// Text Styles
// =============================================================================

export interface MenuFont {
  size: number;
  weight: number;
  lineHeight: number;
  family: string;
  /** Shorthand accepted by CanvasRenderingContext2D.font */
  css: string;
}

const SYSTEM_FAMILY = 'system-ui, -apple-system, "Segoe UI", Roboto, sans-serif';
const MONOSPACED_DIGIT_FAMILY = 'ui-monospace, "SF Mono", Menlo, Consolas, monospace';

function menuFont(size: number, weight: number, family: string): MenuFont {
  return {
    size,
    weight,
    lineHeight: 20,
    family,
    css: `${weight} ${size}px ${family}`,
  };
}

export const MENU_FONTS = {
  title: menuFont(15, 500, SYSTEM_FAMILY),
  status: menuFont(15, 600, SYSTEM_FAMILY),
  detail: menuFont(15, 400, MONOSPACED_DIGIT_FAMILY),
} as const;

export type MenuTextStyle = keyof typeof MENU_FONTS;

// =============================================================================
// Colors
// =============================================================================

export const BADGE_COLORS: Record<MenuBadge, string> = {
  ready: 'rgb(43, 120, 71)',
  pending: 'rgb(140, 36, 36)',
};

export const SECONDARY_LABEL_COLOR = 'rgba(235, 235, 245, 0.6)';
export const SYSTEM_GRAY = 'rgb(142, 142, 147)';
export const SYSTEM_BLUE = 'rgb(10, 132, 255)';
export const SYSTEM_RED = 'rgb(255, 69, 58)';
