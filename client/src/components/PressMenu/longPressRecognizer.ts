/**
 * Long Press Recognizer
 *
 * Recognises a press held in place on an element, and takes over the
 * browser's `contextmenu` event (right click, or long press on touch
 * browsers) so the native menu never opens.
 */

import { pointInSurface } from './coordinateMapper';
import type { Point } from './types';

export interface LongPressOptions {
  delayMs: number;
  moveTolerance: number;
  /** Receives the press location in the element's local coordinates */
  onRecognized: (location: Point) => void;
}

export class LongPressRecognizer {
  private readonly element: HTMLElement;
  private readonly options: LongPressOptions;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private origin: { clientX: number; clientY: number } | null = null;
  /** Set once the timer fired for the current press */
  private recognizedThisPress = false;

  constructor(element: HTMLElement, options: LongPressOptions) {
    this.element = element;
    this.options = options;

    element.addEventListener('pointerdown', this.handlePointerDown);
    element.addEventListener('pointermove', this.handlePointerMove);
    element.addEventListener('pointerup', this.handlePointerEnd);
    element.addEventListener('pointercancel', this.handlePointerEnd);
    element.addEventListener('pointerleave', this.cancel);
    element.addEventListener('contextmenu', this.handleContextMenu);
  }

  dispose(): void {
    this.cancel();
    this.element.removeEventListener('pointerdown', this.handlePointerDown);
    this.element.removeEventListener('pointermove', this.handlePointerMove);
    this.element.removeEventListener('pointerup', this.handlePointerEnd);
    this.element.removeEventListener('pointercancel', this.handlePointerEnd);
    this.element.removeEventListener('pointerleave', this.cancel);
    this.element.removeEventListener('contextmenu', this.handleContextMenu);
  }

  private handlePointerDown = (e: PointerEvent): void => {
    this.recognizedThisPress = false;

    // Secondary buttons are delivered through `contextmenu`
    if (e.button !== 0) return;

    this.cancel();
    this.origin = { clientX: e.clientX, clientY: e.clientY };
    this.timer = setTimeout(() => {
      this.timer = null;
      const origin = this.origin;
      if (!origin) return;
      this.recognizedThisPress = true;
      this.options.onRecognized(pointInSurface(this.element, origin.clientX, origin.clientY));
    }, this.options.delayMs);
  };

  private handlePointerMove = (e: PointerEvent): void => {
    if (!this.origin || this.timer === null) return;

    const dx = e.clientX - this.origin.clientX;
    const dy = e.clientY - this.origin.clientY;
    if (Math.sqrt(dx * dx + dy * dy) > this.options.moveTolerance) {
      this.cancel();
    }
  };

  // A touch browser's follow-up `contextmenu` arrives while the finger is
  // still down, so the press is over for good once it lifts
  private handlePointerEnd = (): void => {
    this.cancel();
    this.recognizedThisPress = false;
  };

  private cancel = (): void => {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.origin = null;
  };

  private handleContextMenu = (e: MouseEvent): void => {
    e.preventDefault();

    // Touch browsers follow a long press with `contextmenu`; the press was
    // already delivered
    if (this.recognizedThisPress) {
      this.recognizedThisPress = false;
      return;
    }

    this.cancel();
    this.options.onRecognized(pointInSurface(this.element, e.clientX, e.clientY));
  };
}
