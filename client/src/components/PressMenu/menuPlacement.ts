/**
 * Menu Placement
 *
 * Centres the popup under its anchor and flips it above when it would run
 * past the bottom of the viewport.
 */

import type { MenuFrame, Rect, Size } from './types';

export interface PlacementInput {
  /** Anchor rect in overlay-local coordinates */
  anchor: Rect;
  /** Popup size */
  menu: Size;
  viewport: Size;
  /** Minimum distance to the viewport edges */
  padding: number;
  /** Distance between anchor and popup */
  gap: number;
}

/**
 * Compute the popup frame for an anchor.
 *
 * Known limitation: when the popup fits neither below nor above the anchor,
 * the above placement is returned as-is and may extend past the top edge.
 */
export function computeMenuFrame({ anchor, menu, viewport, padding, gap }: PlacementInput): MenuFrame {
  let x = anchor.x + anchor.width / 2 - menu.width / 2;
  x = Math.max(padding, Math.min(x, viewport.width - menu.width - padding));

  let y = anchor.y + anchor.height + gap;
  let placement: MenuFrame['placement'] = 'below';

  if (y + menu.height + padding > viewport.height) {
    y = anchor.y - menu.height - gap;
    placement = 'above';
  }

  return { x, y, width: menu.width, height: menu.height, placement };
}
