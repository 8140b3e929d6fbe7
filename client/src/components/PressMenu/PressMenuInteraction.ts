/**
 * PressMenuInteraction
 *
 * Bridges a long press (or the native `contextmenu` event) on a target
 * element to a custom menu presentation:
 *
 *   press recognised -> next tick -> presentMenu(location)
 *     -> haptic -> builder(location) -> MenuPresentation -> presenter
 *
 * The builder decides the anchor; it may ignore the raw press location and
 * anchor to a whole row instead.
 */

import { LongPressRecognizer } from './longPressRecognizer';
import { MenuPresentation } from './MenuPresentation';
import { mountMenuOverlay, type MenuPresenter } from './MenuOverlayHost';
import { navigatorHaptics, type HapticFeedback } from './haptics';
import type { TextMeasurer } from './textMeasure';
import type { MenuBuilder, Point } from './types';
import {
  resolvePressMenuSettings,
  type PressMenuSettings,
  type PressMenuSettingsInput,
} from '../../services/config.service';
import { interactionLogger } from '../../services/logger.service';

// =============================================================================
// Types
// =============================================================================

export interface PressMenuInteractionOptions {
  settings?: PressMenuSettingsInput;
  haptics?: HapticFeedback;
  measurer?: TextMeasurer;
  /** Mounts each presentation; defaults to a fresh React root on document.body */
  presenter?: MenuPresenter;
}

// =============================================================================
// Interaction
// =============================================================================

export class PressMenuInteraction {
  readonly settings: PressMenuSettings;
  private readonly haptics: HapticFeedback;
  private readonly measurer: TextMeasurer | undefined;
  private readonly presenter: MenuPresenter;

  /** Non-owning; the target's lifetime is the host's business */
  private target: WeakRef<HTMLElement> | null = null;
  private builder: MenuBuilder | null = null;
  private recognizer: LongPressRecognizer | null = null;
  private pendingTick: ReturnType<typeof setTimeout> | null = null;
  private active: MenuPresentation | null = null;

  /**
   * @throws MenuConfigurationError when a settings override is out of range
   */
  constructor(options: PressMenuInteractionOptions = {}) {
    this.settings = resolvePressMenuSettings(options.settings);
    this.haptics = options.haptics ?? navigatorHaptics;
    this.measurer = options.measurer;
    this.presenter = options.presenter ?? mountMenuOverlay;
  }

  get isAttached(): boolean {
    return this.recognizer !== null;
  }

  /** The presentation currently on screen, if any */
  get activePresentation(): MenuPresentation | null {
    return this.active;
  }

  /**
   * Install the press recognizer on `target`. Attaching again replaces the
   * previous target and builder.
   */
  attach(target: HTMLElement, builder: MenuBuilder): void {
    this.detach();

    this.target = new WeakRef(target);
    this.builder = builder;
    this.recognizer = new LongPressRecognizer(target, {
      delayMs: this.settings.longPressDelayMs,
      moveTolerance: this.settings.longPressMoveTolerance,
      onRecognized: this.handleRecognized,
    });
  }

  /**
   * Remove the recognizer and drop the target and builder. Idempotent.
   */
  detach(): void {
    if (this.pendingTick !== null) {
      clearTimeout(this.pendingTick);
      this.pendingTick = null;
    }
    this.recognizer?.dispose();
    this.recognizer = null;
    this.target = null;
    this.builder = null;
  }

  /**
   * Show the menu for a press at `location` (target-local coordinates).
   *
   * The haptic tick fires before anything else, so a press that produces no
   * menu still gets feedback.
   */
  presentMenu(location: Point): void {
    this.haptics.impactOccurred('light');

    const target = this.target?.deref();
    const builder = this.builder;
    if (!target || !builder || !target.isConnected) {
      return;
    }

    const configuration = builder(location);
    if (!configuration) {
      interactionLogger.debug({ location }, 'Builder returned no menu');
      return;
    }

    const presentation = new MenuPresentation(configuration, {
      settings: this.settings,
      measurer: this.measurer,
    });
    this.active = presentation;
    presentation.onDispose(() => {
      if (this.active === presentation) {
        this.active = null;
      }
    });

    this.presenter(presentation);
  }

  // Presenting from inside the gesture's own event would race the browser's
  // handling of it, so presentation waits for the next turn
  private handleRecognized = (location: Point): void => {
    if (this.pendingTick !== null) {
      clearTimeout(this.pendingTick);
    }
    this.pendingTick = setTimeout(() => {
      this.pendingTick = null;
      this.presentMenu(location);
    }, 0);
  };
}
