/**
 * PressMenuOverlay Component
 *
 * Renders one MenuPresentation: the dimmed full-screen layer, the popup and
 * its rows. Positioning is delegated to the presentation and runs in a layout
 * effect, after the overlay has been committed and can be measured.
 *
 * Features:
 * - Tap outside the popup dismisses without an action
 * - The browser's context menu is suppressed while the overlay is up
 * - Escape dismisses, resize/rotation dismisses immediately
 * - Keyboard navigation (Arrow keys, Enter, Space)
 * - Modal dialog semantics, one spoken label per row
 */

import {
  Fragment,
  useCallback,
  useEffect,
  useLayoutEffect,
  useRef,
  useSyncExternalStore,
  type CSSProperties,
  type KeyboardEvent as ReactKeyboardEvent,
  type MouseEvent as ReactMouseEvent,
} from 'react';
import { X } from 'lucide-react';
import { buildAccessibilityLabel, postScreenChanged } from './accessibility';
import {
  BADGE_COLORS,
  BADGE_SIZE,
  CONTENT_SPACING,
  MENU_FONTS,
  ROW_HORIZONTAL_PADDING,
  ROW_SPACING,
  ROW_VERTICAL_PADDING,
  SEPARATOR_HEIGHT,
  type MenuFont,
} from './constants';
import type { MenuPresentation } from './MenuPresentation';
import type { MenuItem } from './types';
import './PressMenuOverlay.css';

// =============================================================================
// Helpers
// =============================================================================

function fontStyle(font: MenuFont): CSSProperties {
  return {
    fontFamily: font.family,
    fontSize: font.size,
    fontWeight: font.weight,
    lineHeight: `${font.lineHeight}px`,
  };
}

function focusSibling(container: HTMLElement, step: 1 | -1): void {
  const rows = Array.from(container.querySelectorAll<HTMLElement>('.press-menu__item'));
  if (rows.length === 0) return;

  const current = rows.findIndex((row) => row === container.ownerDocument.activeElement);
  const next = current === -1 ? (step === 1 ? 0 : rows.length - 1) : (current + step + rows.length) % rows.length;
  rows[next]?.focus();
}

// =============================================================================
// Row
// =============================================================================

interface MenuRowProps {
  item: MenuItem;
  height: number;
  detailColumnWidth: number;
  onSelect: (itemId: string) => void;
}

function MenuRow({ item, height, detailColumnWidth, onSelect }: MenuRowProps) {
  return (
    <div
      className="press-menu__item"
      role="button"
      tabIndex={0}
      aria-label={buildAccessibilityLabel(item)}
      data-item-id={item.id}
      style={{
        height,
        padding: `${ROW_VERTICAL_PADDING / 2}px ${ROW_HORIZONTAL_PADDING / 2}px`,
      }}
      onClick={() => onSelect(item.id)}
      onKeyDown={(e) => {
        if (e.key === 'Enter' || e.key === ' ') {
          e.preventDefault();
          onSelect(item.id);
        }
      }}
    >
      {item.badge && (
        <span
          className="press-menu__badge"
          data-badge={item.badge}
          aria-hidden="true"
          style={{
            width: BADGE_SIZE,
            height: BADGE_SIZE,
            marginRight: ROW_SPACING,
            backgroundColor: BADGE_COLORS[item.badge],
          }}
        >
          <X size={12} strokeWidth={3} color="#fff" />
        </span>
      )}

      <span className="press-menu__content" style={{ gap: CONTENT_SPACING }}>
        <span className="press-menu__title" style={fontStyle(MENU_FONTS.title)}>
          {item.title}
        </span>
        <span className="press-menu__spacer" />
        {item.statusText !== undefined && (
          <span className="press-menu__status" style={{ ...fontStyle(MENU_FONTS.status), color: item.statusColor }}>
            {item.statusText}
          </span>
        )}
        {item.detail !== undefined && (
          <span
            className="press-menu__detail"
            style={{ ...fontStyle(MENU_FONTS.detail), color: item.detailColor, width: detailColumnWidth }}
          >
            {item.detail}
          </span>
        )}
      </span>
    </div>
  );
}

// =============================================================================
// Overlay
// =============================================================================

interface PressMenuOverlayProps {
  presentation: MenuPresentation;
}

export function PressMenuOverlay({ presentation }: PressMenuOverlayProps) {
  const overlayRef = useRef<HTMLDivElement>(null);
  const containerRef = useRef<HTMLDivElement>(null);
  const snapshot = useSyncExternalStore(presentation.subscribe, presentation.getSnapshot);
  const { configuration, metrics, settings } = presentation;

  // Measure and position once the overlay exists in the DOM
  useLayoutEffect(() => {
    if (overlayRef.current) {
      presentation.layout(overlayRef.current);
    }
  }, [presentation]);

  useEffect(() => {
    if (snapshot.laidOut && containerRef.current) {
      postScreenChanged(containerRef.current);
    }
  }, [snapshot.laidOut]);

  // A stale frame is never recomputed; resizing closes the menu
  useEffect(() => {
    const view = overlayRef.current?.ownerDocument.defaultView;
    if (!view) return;

    const handleViewportChange = () => presentation.handleViewportChange();
    view.addEventListener('resize', handleViewportChange);
    view.addEventListener('orientationchange', handleViewportChange);
    return () => {
      view.removeEventListener('resize', handleViewportChange);
      view.removeEventListener('orientationchange', handleViewportChange);
    };
  }, [presentation]);

  useEffect(() => {
    const doc = overlayRef.current?.ownerDocument;
    if (!doc) return;

    const handleEscape = (e: KeyboardEvent) => {
      if (e.key === 'Escape') {
        e.preventDefault();
        presentation.dismissWithoutAction('escape');
      }
    };
    doc.addEventListener('keydown', handleEscape);
    return () => doc.removeEventListener('keydown', handleEscape);
  }, [presentation]);

  const handleSelect = useCallback(
    (itemId: string) => {
      presentation.selectItem(itemId);
    },
    [presentation]
  );

  // Clicks inside the popup stop at the container, so anything reaching the
  // overlay landed outside the popup
  const handleBackgroundClick = useCallback(() => {
    presentation.dismissWithoutAction('background');
  }, [presentation]);

  // The browser's own menu never opens over this one; a secondary press on
  // the dim layer closes the menu like a tap there
  const handleContextMenu = useCallback(
    (e: ReactMouseEvent<HTMLDivElement>) => {
      e.preventDefault();
      if (e.target === e.currentTarget) {
        presentation.dismissWithoutAction('background');
      }
    },
    [presentation]
  );

  const handleKeyDown = useCallback((e: ReactKeyboardEvent<HTMLDivElement>) => {
    if (e.key === 'ArrowDown' || e.key === 'ArrowUp') {
      e.preventDefault();
      focusSibling(e.currentTarget, e.key === 'ArrowDown' ? 1 : -1);
    }
  }, []);

  const { frame } = snapshot;
  const visible = snapshot.state === 'presenting' || snapshot.state === 'presented';

  return (
    <div
      ref={overlayRef}
      className="press-menu-overlay"
      data-state={snapshot.state}
      onClick={handleBackgroundClick}
      onContextMenu={handleContextMenu}
    >
      <div
        ref={containerRef}
        className="press-menu"
        role="dialog"
        aria-modal="true"
        aria-label="Context menu"
        tabIndex={-1}
        data-placement={frame?.placement}
        style={{
          left: frame?.x,
          top: frame?.y,
          width: frame?.width ?? metrics.width,
          height: frame?.height ?? metrics.height,
          opacity: visible ? 1 : 0,
          transition: `opacity ${settings.fadeDurationMs}ms ease`,
        }}
        onClick={(e) => e.stopPropagation()}
        onKeyDown={handleKeyDown}
      >
        {configuration.items.map((item, index) => (
          <Fragment key={item.id}>
            {index > 0 && (
              <div className="press-menu__separator" role="separator" style={{ height: SEPARATOR_HEIGHT }} />
            )}
            <MenuRow
              item={item}
              height={metrics.itemHeights[index] ?? 0}
              detailColumnWidth={metrics.detailColumnWidth}
              onSelect={handleSelect}
            />
          </Fragment>
        ))}
      </div>
    </div>
  );
}
