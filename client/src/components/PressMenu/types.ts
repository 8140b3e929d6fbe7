/**
 * Press Menu Type Definitions
 *
 * A press menu replaces the browser's native context menu with a custom
 * popup anchored to an element (a table row, a panel, ...).
 */

// =============================================================================
// Geometry
// =============================================================================

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect extends Point, Size {}

// =============================================================================
// Menu Items
// =============================================================================

/**
 * Binary status indicator rendered in front of an item's title
 */
export type MenuBadge = 'ready' | 'pending';

/**
 * A single row in the menu.
 *
 * Layout, left to right:
 * ```
 * [ badge | title | spacer | statusText | detail ]
 * ```
 */
export interface MenuItem {
  /** Unique token, generated per item */
  readonly id: string;
  readonly badge?: MenuBadge;
  readonly title: string;
  readonly statusText?: string;
  readonly statusColor?: string;
  /** Right-aligned, shares one column width with every other item's detail */
  readonly detail?: string;
  readonly detailColor: string;
  /** Invoked once, after the menu has been dismissed by tapping this item */
  readonly action: () => void;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * How the popup width is chosen
 */
export type WidthMode =
  | { kind: 'auto'; minWidth: number }
  | { kind: 'fixed'; width: number };

/**
 * Everything needed to present one menu.
 * Built fresh by the builder callback on every gesture.
 */
export interface MenuConfiguration {
  readonly items: readonly MenuItem[];
  /** Anchor rectangle in `sourceView`'s local (scrollable content) coordinates */
  readonly sourceRect: Rect;
  readonly sourceView: HTMLElement;
  readonly widthMode: WidthMode;
}

/**
 * Maps a press location (in the target's local coordinates) to a menu.
 * Returning null or undefined suppresses the menu.
 */
export type MenuBuilder = (location: Point) => MenuConfiguration | null | undefined;

// =============================================================================
// Presentation
// =============================================================================

export type PresentationState = 'unpresented' | 'presenting' | 'presented' | 'dismissing';

export type DismissReason = 'item' | 'background' | 'escape' | 'viewport-change' | 'programmatic';

export type MenuPlacement = 'below' | 'above';

/**
 * Final popup frame in overlay-local coordinates
 */
export interface MenuFrame extends Rect {
  placement: MenuPlacement;
}

/**
 * Sizes resolved for one configuration
 */
export interface MenuMetrics {
  width: number;
  height: number;
  itemHeights: number[];
  detailColumnWidth: number;
}
