/**
 * Menu Sizing
 *
 * Pure width/height computation for a list of menu items. The constants here
 * mirror the rendered row layout in PressMenuOverlay; if one changes the
 * other must follow or auto-sized menus clip or gain excess padding.
 */

import {
  BADGE_SIZE,
  CONTENT_SPACING,
  MENU_FONTS,
  ROW_HORIZONTAL_PADDING,
  ROW_MIN_HEIGHT,
  ROW_SPACING,
  ROW_VERTICAL_PADDING,
  SEPARATOR_HEIGHT,
} from './constants';
import type { TextMeasurer } from './textMeasure';
import type { MenuItem, MenuMetrics, WidthMode } from './types';

export interface WidthBounds {
  autoMinWidth: number;
  autoMaxWidth: number;
}

// =============================================================================
// Width
// =============================================================================

/**
 * Unclamped width needed to show one item without clipping.
 */
export function computeItemWidth(item: MenuItem, measurer: TextMeasurer): number {
  let width = ROW_HORIZONTAL_PADDING;

  if (item.badge) {
    width += BADGE_SIZE + ROW_SPACING;
  }

  width += Math.ceil(measurer.measure(item.title, 'title'));

  // title -> spacer is always there, one more gap per optional label
  let gaps = 1;

  if (item.statusText !== undefined) {
    width += Math.ceil(measurer.measure(item.statusText, 'status'));
    gaps += 1;
  }

  if (item.detail !== undefined) {
    width += Math.ceil(measurer.measure(item.detail, 'detail'));
    gaps += 1;
  }

  return width + gaps * CONTENT_SPACING;
}

/**
 * Narrowest width that fits every item, clamped to the auto bounds.
 * A caller minimum above the lower bound raises the floor.
 */
export function computeAutoWidth(
  items: readonly MenuItem[],
  minWidth: number,
  measurer: TextMeasurer,
  bounds: WidthBounds
): number {
  const floor = Math.max(bounds.autoMinWidth, minWidth);

  let widest = 0;
  for (const item of items) {
    widest = Math.max(widest, computeItemWidth(item, measurer));
  }

  return Math.max(floor, Math.min(Math.ceil(widest), bounds.autoMaxWidth));
}

export function resolveMenuWidth(
  items: readonly MenuItem[],
  widthMode: WidthMode,
  measurer: TextMeasurer,
  bounds: WidthBounds
): number {
  switch (widthMode.kind) {
    case 'auto':
      return computeAutoWidth(items, widthMode.minWidth, measurer, bounds);
    case 'fixed':
      return widthMode.width;
  }
}

// =============================================================================
// Height
// =============================================================================

export function computeItemHeight(item: MenuItem): number {
  const lineHeight = Math.max(
    MENU_FONTS.title.lineHeight,
    item.statusText !== undefined ? MENU_FONTS.status.lineHeight : 0,
    item.detail !== undefined ? MENU_FONTS.detail.lineHeight : 0
  );
  const contentHeight = item.badge ? Math.max(lineHeight, BADGE_SIZE) : lineHeight;
  return Math.max(ROW_MIN_HEIGHT, contentHeight + ROW_VERTICAL_PADDING);
}

/**
 * Total popup height: every row plus one separator between neighbours.
 */
export function computeMenuHeight(items: readonly MenuItem[]): number {
  if (items.length === 0) {
    return 0;
  }

  const rows = items.reduce((sum, item) => sum + computeItemHeight(item), 0);
  return rows + (items.length - 1) * SEPARATOR_HEIGHT;
}

// =============================================================================
// Detail Column
// =============================================================================

/**
 * Shared width of every detail label, so numeric details line up.
 */
export function computeDetailColumnWidth(items: readonly MenuItem[], measurer: TextMeasurer): number {
  let widest = 0;
  for (const item of items) {
    if (item.detail !== undefined) {
      widest = Math.max(widest, measurer.measure(item.detail, 'detail'));
    }
  }
  return Math.ceil(widest);
}

// =============================================================================
// All Metrics
// =============================================================================

export function computeMenuMetrics(
  items: readonly MenuItem[],
  widthMode: WidthMode,
  measurer: TextMeasurer,
  bounds: WidthBounds
): MenuMetrics {
  return {
    width: resolveMenuWidth(items, widthMode, measurer, bounds),
    height: computeMenuHeight(items),
    itemHeights: items.map(computeItemHeight),
    detailColumnWidth: computeDetailColumnWidth(items, measurer),
  };
}
