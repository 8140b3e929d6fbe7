/**
 * Accessibility helpers for menu rows and the popup container.
 */

import type { MenuItem } from './types';

/**
 * Single spoken label for a row: title, status and detail, present fields only.
 */
export function buildAccessibilityLabel(item: Pick<MenuItem, 'title' | 'statusText' | 'detail'>): string {
  return [item.title, item.statusText, item.detail]
    .filter((part): part is string => part !== undefined)
    .join(', ');
}

/**
 * Tell assistive technology the screen changed and move focus into `element`.
 */
export function postScreenChanged(element: HTMLElement): void {
  element.focus({ preventScroll: true });
}
