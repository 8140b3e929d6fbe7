/**
 * Menu Configuration Factories
 *
 * Builders call these on every gesture. Input is validated with zod so a bad
 * rect or width surfaces in the builder, not halfway through a presentation.
 */

import { z } from 'zod';
import { SECONDARY_LABEL_COLOR } from './constants';
import { MenuConfigurationError } from './errors';
import { DEFAULT_SETTINGS, type PressMenuSettings } from '../../services/config.service';
import type { MenuConfiguration, MenuItem, Rect, WidthMode } from './types';

// =============================================================================
// Schemas
// =============================================================================

const RectSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  width: z.number().finite().nonnegative(),
  height: z.number().finite().nonnegative(),
});

const WidthModeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('auto'), minWidth: z.number().finite().nonnegative() }),
  z.object({ kind: z.literal('fixed'), width: z.number().finite().positive() }),
]);

const MenuItemInputSchema = z.object({
  badge: z.enum(['ready', 'pending']).optional(),
  title: z.string().min(1, 'Item title is required'),
  statusText: z.string().optional(),
  statusColor: z.string().optional(),
  detail: z.string().optional(),
  detailColor: z.string().optional(),
  action: z.custom<() => void>((value) => typeof value === 'function', 'Item action must be a function'),
});

const MenuItemSchema = z.custom<MenuItem>(
  (value) => typeof value === 'object' && value !== null && 'id' in value && 'action' in value,
  'Items must be created with createMenuItem'
);

const SourceViewSchema = z.custom<HTMLElement>(
  (value) =>
    typeof value === 'object' && value !== null && 'ownerDocument' in value && 'getBoundingClientRect' in value,
  'sourceView must be an element'
);

const MenuConfigurationInputSchema = z.object({
  items: z.array(MenuItemSchema),
  sourceRect: RectSchema,
  sourceView: SourceViewSchema,
  widthMode: WidthModeSchema.optional(),
});

// =============================================================================
// Type Exports
// =============================================================================

export type MenuItemInput = z.input<typeof MenuItemInputSchema>;

export interface MenuConfigurationInput {
  items: readonly MenuItem[];
  sourceRect: Rect;
  sourceView: HTMLElement;
  /** Defaults to a fixed width (250 unless overridden in settings) */
  widthMode?: WidthMode;
}

// =============================================================================
// Width Modes
// =============================================================================

/**
 * Size the popup from its content; `minWidth` raises the lower bound.
 */
export function autoWidth(minWidth = 0): WidthMode {
  return { kind: 'auto', minWidth };
}

export function fixedWidth(width: number): WidthMode {
  return { kind: 'fixed', width };
}

// =============================================================================
// Factories
// =============================================================================

let itemSequence = 0;

/**
 * @throws MenuConfigurationError
 */
export function createMenuItem(input: MenuItemInput): MenuItem {
  const result = MenuItemInputSchema.safeParse(input);
  if (!result.success) {
    throw new MenuConfigurationError('menu item', result.error);
  }

  itemSequence += 1;
  const { detailColor, ...fields } = result.data;

  return Object.freeze({
    ...fields,
    id: `press-menu-item-${itemSequence}`,
    detailColor: detailColor ?? SECONDARY_LABEL_COLOR,
  });
}

/**
 * @throws MenuConfigurationError
 */
export function createMenuConfiguration(
  input: MenuConfigurationInput,
  settings: PressMenuSettings = DEFAULT_SETTINGS
): MenuConfiguration {
  const result = MenuConfigurationInputSchema.safeParse(input);
  if (!result.success) {
    throw new MenuConfigurationError('menu configuration', result.error);
  }

  const { items, sourceRect, sourceView, widthMode } = result.data;

  return Object.freeze({
    items: Object.freeze([...items]),
    sourceRect: Object.freeze({ ...sourceRect }),
    sourceView,
    widthMode: widthMode ?? fixedWidth(settings.defaultFixedWidth),
  });
}
