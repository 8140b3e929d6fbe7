/**
 * Coordinate Mapper
 *
 * The overlay is a separate top-level node, not an ancestor of the anchor,
 * so rects travel through the shared viewport space:
 *
 *   anchor-local -> anchor viewport -> (parent frames) -> overlay-local
 *
 * "Local" means the element's scrollable content box, the space a table
 * reports its row rects in.
 */

import type { Point, Rect, Size } from './types';

/**
 * Viewport position of an element's local origin.
 */
function localOrigin(element: HTMLElement): Point {
  const bounds = element.getBoundingClientRect();
  return {
    x: bounds.left + element.clientLeft - element.scrollLeft,
    y: bounds.top + element.clientTop - element.scrollTop,
  };
}

/**
 * Offset that takes a point from `from`'s viewport into `to`'s viewport by
 * walking up the frame chain. Null when `to` is not reachable.
 */
function documentOffset(from: Document, to: Document): Point | null {
  const offset = { x: 0, y: 0 };
  let current: Document = from;

  while (current !== to) {
    const frame = current.defaultView?.frameElement;
    if (!(frame instanceof HTMLElement)) {
      return null;
    }
    const frameOrigin = localOrigin(frame);
    offset.x += frameOrigin.x + frame.scrollLeft;
    offset.y += frameOrigin.y + frame.scrollTop;
    current = frame.ownerDocument;
  }

  return offset;
}

/**
 * Map a rect from `anchor`'s local space into `overlay`'s local space.
 *
 * Returns null when the two elements have no common coordinate space: one
 * of them is detached, or their documents are not nested in one another.
 */
export function mapRectToOverlay(anchor: HTMLElement, rect: Rect, overlay: HTMLElement): Rect | null {
  if (!anchor.isConnected || !overlay.isConnected) {
    return null;
  }

  const frameOffset = documentOffset(anchor.ownerDocument, overlay.ownerDocument);
  if (!frameOffset) {
    return null;
  }

  const anchorOrigin = localOrigin(anchor);
  const overlayOrigin = localOrigin(overlay);

  return {
    x: rect.x + anchorOrigin.x + frameOffset.x - overlayOrigin.x,
    y: rect.y + anchorOrigin.y + frameOffset.y - overlayOrigin.y,
    width: rect.width,
    height: rect.height,
  };
}

/**
 * Convert a viewport (client) point into `surface`'s local space.
 */
export function pointInSurface(surface: HTMLElement, clientX: number, clientY: number): Point {
  const origin = localOrigin(surface);
  return {
    x: clientX - origin.x,
    y: clientY - origin.y,
  };
}

/**
 * Visible size of the overlay, used as the placement viewport.
 */
export function measureViewport(overlay: HTMLElement): Size {
  const bounds = overlay.getBoundingClientRect();
  return { width: bounds.width, height: bounds.height };
}
