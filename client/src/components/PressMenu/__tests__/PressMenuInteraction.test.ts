/**
 * PressMenuInteraction Tests
 *
 * Gesture recognition, presentation scheduling, detach semantics and the
 * full mount/unmount cycle through the default presenter.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { act } from '@testing-library/react';
import { PressMenuInteraction } from '../PressMenuInteraction';
import { mountMenuOverlay } from '../MenuOverlayHost';
import { createMenuConfiguration, createMenuItem } from '../menuConfiguration';
import type { HapticFeedback, ImpactStyle } from '../haptics';
import type { MenuBuilder, MenuConfiguration, Point } from '../types';
import type { MenuPresentation } from '../MenuPresentation';
import { charWidthMeasurer, toDOMRect } from '../../../test/helpers';

// =============================================================================
// Test Helpers
// =============================================================================

function createTarget(): HTMLElement {
  const target = document.createElement('div');
  document.body.appendChild(target);
  vi.spyOn(target, 'getBoundingClientRect').mockReturnValue(toDOMRect({ left: 10, top: 20, width: 300, height: 200 }));
  return target;
}

function dispatchPointer(target: HTMLElement, type: string, clientX: number, clientY: number): void {
  target.dispatchEvent(new MouseEvent(type, { button: 0, clientX, clientY, bubbles: true }));
}

function dispatchContextMenu(target: HTMLElement, clientX: number, clientY: number): MouseEvent {
  const event = new MouseEvent('contextmenu', { button: 2, clientX, clientY, bubbles: true, cancelable: true });
  target.dispatchEvent(event);
  return event;
}

function createHarness() {
  const calls: string[] = [];
  const haptics: HapticFeedback = {
    impactOccurred: vi.fn((style: ImpactStyle) => {
      calls.push(`haptic:${style}`);
    }),
  };
  const presenter = vi.fn((presentation: MenuPresentation) => {
    calls.push(`present:${presentation.configuration.items.length}`);
  });
  const interaction = new PressMenuInteraction({ haptics, presenter, measurer: charWidthMeasurer });
  return { calls, haptics, presenter, interaction };
}

function menuFor(target: HTMLElement, action: () => void = vi.fn()): MenuConfiguration {
  return createMenuConfiguration({
    items: [createMenuItem({ title: 'Share', action })],
    sourceRect: { x: 0, y: 0, width: 300, height: 44 },
    sourceView: target,
  });
}

// =============================================================================
// Tests
// =============================================================================

describe('PressMenuInteraction', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  // ===========================================================================
  // Attach
  // ===========================================================================

  describe('attach', () => {
    it('reports attachment', () => {
      const { interaction } = createHarness();
      expect(interaction.isAttached).toBe(false);

      interaction.attach(createTarget(), () => null);

      expect(interaction.isAttached).toBe(true);
    });

    it('suppresses the native context menu', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      interaction.attach(target, () => null);

      const event = dispatchContextMenu(target, 50, 70);

      expect(event.defaultPrevented).toBe(true);
    });

    it('replaces the previous target when attached again', () => {
      const { interaction } = createHarness();
      const first = createTarget();
      const second = createTarget();
      const firstBuilder = vi.fn<MenuBuilder>(() => null);
      const secondBuilder = vi.fn<MenuBuilder>(() => null);

      interaction.attach(first, firstBuilder);
      interaction.attach(second, secondBuilder);

      expect(dispatchContextMenu(first, 50, 70).defaultPrevented).toBe(false);
      dispatchContextMenu(second, 50, 70);
      vi.runAllTimers();

      expect(firstBuilder).not.toHaveBeenCalled();
      expect(secondBuilder).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // Presentation
  // ===========================================================================

  describe('presentation', () => {
    it('calls the builder on the next tick with the target-local point', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => null);
      interaction.attach(target, builder);

      dispatchContextMenu(target, 50, 70);
      expect(builder).not.toHaveBeenCalled();

      vi.advanceTimersByTime(0);

      expect(builder).toHaveBeenCalledWith({ x: 40, y: 50 });
    });

    it('fires the haptic before calling the builder', () => {
      const { calls, interaction } = createHarness();
      const target = createTarget();
      interaction.attach(target, () => {
        calls.push('builder');
        return menuFor(target);
      });

      interaction.presentMenu({ x: 0, y: 0 });

      expect(calls).toEqual(['haptic:light', 'builder', 'present:1']);
    });

    it('presents nothing when the builder returns null', () => {
      const { haptics, interaction, presenter } = createHarness();
      interaction.attach(createTarget(), () => null);

      interaction.presentMenu({ x: 5, y: 5 });

      expect(haptics.impactOccurred).toHaveBeenCalledWith('light');
      expect(presenter).not.toHaveBeenCalled();
      expect(interaction.activePresentation).toBeNull();
    });

    it('tracks the active presentation until it is disposed', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      interaction.attach(target, () => menuFor(target));

      interaction.presentMenu({ x: 0, y: 0 });
      const presentation = interaction.activePresentation;

      expect(presentation).not.toBeNull();
      presentation?.handleViewportChange();
      expect(interaction.activePresentation).toBeNull();
    });

    it('does nothing once the target has left the document', () => {
      const { haptics, interaction, presenter } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => menuFor(target));
      interaction.attach(target, builder);
      target.remove();

      interaction.presentMenu({ x: 0, y: 0 });

      expect(haptics.impactOccurred).toHaveBeenCalledTimes(1);
      expect(builder).not.toHaveBeenCalled();
      expect(presenter).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // Long Press
  // ===========================================================================

  describe('long press', () => {
    it('recognises a press held for the delay', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => null);
      interaction.attach(target, builder);

      dispatchPointer(target, 'pointerdown', 60, 80);
      vi.advanceTimersByTime(499);
      expect(builder).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      vi.advanceTimersByTime(0);

      expect(builder).toHaveBeenCalledWith({ x: 50, y: 60 });
    });

    it('does not deliver the follow-up contextmenu a second time', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => null);
      interaction.attach(target, builder);

      dispatchPointer(target, 'pointerdown', 60, 80);
      vi.advanceTimersByTime(500);
      const event = dispatchContextMenu(target, 60, 80);
      vi.runAllTimers();

      expect(event.defaultPrevented).toBe(true);
      expect(builder).toHaveBeenCalledTimes(1);
    });

    it('delivers a right click that follows a completed hold', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => null);
      interaction.attach(target, builder);

      dispatchPointer(target, 'pointerdown', 60, 80);
      vi.advanceTimersByTime(500);
      dispatchPointer(target, 'pointerup', 60, 80);
      vi.runAllTimers();
      expect(builder).toHaveBeenCalledTimes(1);

      target.dispatchEvent(new MouseEvent('pointerdown', { button: 2, clientX: 30, clientY: 40, bubbles: true }));
      const event = dispatchContextMenu(target, 30, 40);
      vi.runAllTimers();

      expect(event.defaultPrevented).toBe(true);
      expect(builder).toHaveBeenCalledTimes(2);
      expect(builder).toHaveBeenLastCalledWith({ x: 20, y: 20 });
    });

    it('delivers a contextmenu without a press once the hold was released', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => null);
      interaction.attach(target, builder);

      dispatchPointer(target, 'pointerdown', 60, 80);
      vi.advanceTimersByTime(500);
      dispatchPointer(target, 'pointerup', 60, 80);
      dispatchContextMenu(target, 30, 40);
      vi.runAllTimers();

      expect(builder).toHaveBeenCalledTimes(2);
    });

    it('cancels when the pointer is released early', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => null);
      interaction.attach(target, builder);

      dispatchPointer(target, 'pointerdown', 60, 80);
      vi.advanceTimersByTime(300);
      dispatchPointer(target, 'pointerup', 60, 80);
      vi.runAllTimers();

      expect(builder).not.toHaveBeenCalled();
    });

    it('cancels when the pointer moves beyond the tolerance', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => null);
      interaction.attach(target, builder);

      dispatchPointer(target, 'pointerdown', 60, 80);
      dispatchPointer(target, 'pointermove', 68, 88);
      vi.runAllTimers();

      expect(builder).not.toHaveBeenCalled();
    });

    it('tolerates small movement', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => null);
      interaction.attach(target, builder);

      dispatchPointer(target, 'pointerdown', 60, 80);
      dispatchPointer(target, 'pointermove', 66, 87);
      vi.runAllTimers();

      expect(builder).toHaveBeenCalledWith({ x: 50, y: 60 });
    });

    it('honours a custom delay from settings', () => {
      const interaction = new PressMenuInteraction({
        settings: { longPressDelayMs: 800 },
        haptics: { impactOccurred: vi.fn() },
        presenter: vi.fn(),
      });
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => null);
      interaction.attach(target, builder);

      dispatchPointer(target, 'pointerdown', 60, 80);
      vi.advanceTimersByTime(500);
      vi.advanceTimersByTime(0);
      expect(builder).not.toHaveBeenCalled();

      vi.advanceTimersByTime(300);
      vi.advanceTimersByTime(0);
      expect(builder).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // Detach
  // ===========================================================================

  describe('detach', () => {
    it('is idempotent and makes presentMenu a no-op', () => {
      const { interaction, presenter } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => menuFor(target));
      interaction.attach(target, builder);

      interaction.detach();
      interaction.detach();
      interaction.presentMenu({ x: 0, y: 0 });

      expect(interaction.isAttached).toBe(false);
      expect(builder).not.toHaveBeenCalled();
      expect(presenter).not.toHaveBeenCalled();
    });

    it('cancels a presentation scheduled for the next tick', () => {
      const { haptics, interaction } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => null);
      interaction.attach(target, builder);

      dispatchContextMenu(target, 50, 70);
      interaction.detach();
      vi.runAllTimers();

      expect(haptics.impactOccurred).not.toHaveBeenCalled();
      expect(builder).not.toHaveBeenCalled();
    });

    it('restores the native context menu', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      interaction.attach(target, () => null);

      interaction.detach();

      expect(dispatchContextMenu(target, 50, 70).defaultPrevented).toBe(false);
    });

    it('works again after re-attaching', () => {
      const { interaction } = createHarness();
      const target = createTarget();
      const builder = vi.fn<MenuBuilder>(() => null);
      interaction.attach(target, builder);
      interaction.detach();

      interaction.attach(target, builder);
      dispatchContextMenu(target, 50, 70);
      vi.runAllTimers();

      expect(builder).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // Overlay Lifecycle
  // ===========================================================================

  describe('with the default presenter', () => {
    function hostCount(): number {
      return document.querySelectorAll('.press-menu-host').length;
    }

    function present(interaction: PressMenuInteraction, location: Point): void {
      act(() => {
        interaction.presentMenu(location);
      });
    }

    it('mounts a host and removes it after the tapped action', () => {
      const interaction = new PressMenuInteraction({
        haptics: { impactOccurred: vi.fn() },
        measurer: charWidthMeasurer,
        presenter: mountMenuOverlay,
      });
      const target = createTarget();
      let stateSeenByAction: string | undefined;
      const action = vi.fn(() => {
        stateSeenByAction = interaction.activePresentation === null ? 'disposed' : 'active';
      });
      interaction.attach(target, () => menuFor(target, action));

      present(interaction, { x: 0, y: 0 });
      expect(hostCount()).toBe(1);

      const row = document.querySelector<HTMLElement>('.press-menu__item');
      act(() => {
        row?.click();
      });
      expect(action).not.toHaveBeenCalled();

      act(() => {
        vi.advanceTimersByTime(150);
      });

      expect(action).toHaveBeenCalledTimes(1);
      expect(stateSeenByAction).toBe('disposed');
      expect(hostCount()).toBe(0);
    });

    it('leaves nothing behind across sequential presentations', () => {
      const interaction = new PressMenuInteraction({
        haptics: { impactOccurred: vi.fn() },
        measurer: charWidthMeasurer,
      });
      const target = createTarget();
      interaction.attach(target, () => menuFor(target));

      for (let i = 0; i < 3; i++) {
        present(interaction, { x: 0, y: 0 });
        expect(hostCount()).toBe(1);

        act(() => {
          interaction.activePresentation?.handleViewportChange();
        });
        expect(hostCount()).toBe(0);
      }
    });

    it('mounts nothing when the builder declines', () => {
      const interaction = new PressMenuInteraction({ haptics: { impactOccurred: vi.fn() } });
      interaction.attach(createTarget(), () => null);

      present(interaction, { x: 0, y: 0 });

      expect(hostCount()).toBe(0);
    });
  });
});
