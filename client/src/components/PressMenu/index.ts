/**
 * Press Menu
 *
 * Custom long-press context menu: badges, status text, an aligned detail
 * column, haptics and accessibility announcements.
 */

export { PressMenuInteraction } from './PressMenuInteraction';
export type { PressMenuInteractionOptions } from './PressMenuInteraction';
export { usePressMenu } from './usePressMenu';
export { MenuPresentation } from './MenuPresentation';
export type { MenuPresentationOptions, PresentationSnapshot } from './MenuPresentation';
export { PressMenuOverlay } from './PressMenuOverlay';
export { mountMenuOverlay } from './MenuOverlayHost';
export type { MenuPresenter } from './MenuOverlayHost';
export { createMenuItem, createMenuConfiguration, autoWidth, fixedWidth } from './menuConfiguration';
export type { MenuItemInput, MenuConfigurationInput } from './menuConfiguration';
export { MenuConfigurationError } from './errors';
export { BADGE_COLORS } from './constants';
export { navigatorHaptics } from './haptics';
export type { HapticFeedback, ImpactStyle } from './haptics';
export { createCanvasTextMeasurer } from './textMeasure';
export type { TextMeasurer } from './textMeasure';
export type {
  Point,
  Rect,
  MenuBadge,
  MenuItem,
  MenuConfiguration,
  MenuBuilder,
  WidthMode,
  PresentationState,
  MenuFrame,
} from './types';
