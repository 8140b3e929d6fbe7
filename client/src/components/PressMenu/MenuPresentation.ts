/**
 * MenuPresentation
 *
 * One show/dismiss cycle of a press menu:
 *
 *   unpresented -> presenting -> presented -> dismissing -> unpresented (disposed)
 *
 * `layout()` is called once by the overlay after its first commit, when the
 * overlay node exists and can be measured. A presentation is never reused;
 * the bridge builds a fresh one per gesture.
 */

import { computeMenuMetrics } from './menuSizing';
import { computeMenuFrame } from './menuPlacement';
import { mapRectToOverlay, measureViewport } from './coordinateMapper';
import { getDefaultTextMeasurer, type TextMeasurer } from './textMeasure';
import { DEFAULT_SETTINGS, type PressMenuSettings } from '../../services/config.service';
import { logError, logWarn, presentationLogger } from '../../services/logger.service';
import type {
  DismissReason,
  MenuConfiguration,
  MenuFrame,
  MenuItem,
  MenuMetrics,
  PresentationState,
} from './types';

// =============================================================================
// Types
// =============================================================================

export interface MenuPresentationOptions {
  settings?: PressMenuSettings;
  measurer?: TextMeasurer;
}

/**
 * Immutable view of the presentation, replaced on every change
 */
export interface PresentationSnapshot {
  state: PresentationState;
  /** Null until laid out, and when the anchor could not be mapped */
  frame: MenuFrame | null;
  /** True once layout has run; the popup fades in from here */
  laidOut: boolean;
  disposed: boolean;
}

interface DismissOptions {
  animated: boolean;
  reason: DismissReason;
  completion?: () => void;
}

// =============================================================================
// Presentation
// =============================================================================

export class MenuPresentation {
  readonly configuration: MenuConfiguration;
  readonly metrics: MenuMetrics;
  readonly settings: PressMenuSettings;

  private snapshot: PresentationSnapshot = {
    state: 'unpresented',
    frame: null,
    laidOut: false,
    disposed: false,
  };
  private listeners = new Set<() => void>();
  private disposeCallbacks: Array<() => void> = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Completion of an animated dismissal still fading out */
  private pendingCompletion: (() => void) | undefined;

  constructor(configuration: MenuConfiguration, options: MenuPresentationOptions = {}) {
    this.configuration = configuration;
    this.settings = options.settings ?? DEFAULT_SETTINGS;
    this.metrics = computeMenuMetrics(
      configuration.items,
      configuration.widthMode,
      options.measurer ?? getDefaultTextMeasurer(),
      this.settings
    );
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  get state(): PresentationState {
    return this.snapshot.state;
  }

  get frame(): MenuFrame | null {
    return this.snapshot.frame;
  }

  get isDisposed(): boolean {
    return this.snapshot.disposed;
  }

  getSnapshot = (): PresentationSnapshot => this.snapshot;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Run `callback` once the presentation has been dismissed and torn down.
   */
  onDispose(callback: () => void): void {
    if (this.snapshot.disposed) {
      callback();
      return;
    }
    this.disposeCallbacks.push(callback);
  }

  private update(patch: Partial<PresentationSnapshot>): void {
    this.snapshot = { ...this.snapshot, ...patch };
    for (const listener of [...this.listeners]) {
      listener();
    }
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Layout
  // ---------------------------------------------------------------------------

  /**
   * Position the popup inside `overlay` and start the fade-in.
   * Runs once; later calls return the frame computed the first time.
   */
  layout(overlay: HTMLElement): MenuFrame | null {
    if (this.snapshot.disposed || this.snapshot.laidOut) {
      return this.snapshot.frame;
    }

    const { sourceView, sourceRect } = this.configuration;
    const anchor = mapRectToOverlay(sourceView, sourceRect, overlay);

    let frame: MenuFrame | null = null;
    if (anchor) {
      frame = computeMenuFrame({
        anchor,
        menu: { width: this.metrics.width, height: this.metrics.height },
        viewport: measureViewport(overlay),
        padding: this.settings.screenPadding,
        gap: this.settings.anchorGap,
      });
      presentationLogger.debug({ anchor, frame }, 'Menu laid out');
    } else {
      logWarn('presentation', 'Anchor has no common coordinate space with the overlay, menu left unpositioned', {
        sourceRect,
      });
    }

    this.update({ state: 'presenting', frame, laidOut: true });

    this.timer = setTimeout(() => {
      this.timer = null;
      if (this.snapshot.state === 'presenting') {
        this.update({ state: 'presented' });
      }
    }, this.settings.fadeDurationMs);

    return frame;
  }

  // ---------------------------------------------------------------------------
  // Dismissal
  // ---------------------------------------------------------------------------

  /**
   * Dismiss because `itemId` was tapped. The item's action runs after the
   * presentation is disposed. Returns false when the tap was ignored.
   */
  selectItem(itemId: string): boolean {
    if (this.snapshot.state !== 'presenting' && this.snapshot.state !== 'presented') {
      return false;
    }

    const item = this.configuration.items.find((candidate) => candidate.id === itemId);
    if (!item) {
      return false;
    }

    this.dismiss({
      animated: true,
      reason: 'item',
      completion: () => this.runAction(item),
    });
    return true;
  }

  /**
   * Tap outside the popup, or Escape
   */
  dismissWithoutAction(reason: 'background' | 'escape' | 'programmatic' = 'programmatic'): void {
    this.dismiss({ animated: true, reason });
  }

  /**
   * The viewport was resized or rotated; the computed frame is stale.
   */
  handleViewportChange(): void {
    this.dismiss({ animated: false, reason: 'viewport-change' });
  }

  /**
   * Safe to call repeatedly; only the first call has any effect, except that
   * a non-animated dismissal cuts a running fade-out short.
   */
  dismiss({ animated, reason, completion }: DismissOptions): void {
    if (this.snapshot.disposed) {
      return;
    }

    if (this.snapshot.state === 'dismissing') {
      if (!animated) {
        presentationLogger.debug({ reason }, 'Cutting fade-out short');
        this.clearTimer();
        this.finishDismissal(this.pendingCompletion);
      }
      return;
    }

    this.clearTimer();
    presentationLogger.debug({ reason, animated }, 'Dismissing menu');

    if (!animated) {
      this.finishDismissal(completion);
      return;
    }

    this.pendingCompletion = completion;
    this.update({ state: 'dismissing' });
    this.timer = setTimeout(() => {
      this.timer = null;
      this.finishDismissal(this.pendingCompletion);
    }, this.settings.fadeDurationMs);
  }

  private finishDismissal(completion?: () => void): void {
    this.pendingCompletion = undefined;
    this.update({ state: 'unpresented', disposed: true });
    this.listeners.clear();

    const callbacks = this.disposeCallbacks;
    this.disposeCallbacks = [];
    for (const callback of callbacks) {
      callback();
    }

    completion?.();
  }

  private runAction(item: MenuItem): void {
    try {
      item.action();
    } catch (error) {
      logError('presentation', error, { itemId: item.id, title: item.title });
    }
  }
}
