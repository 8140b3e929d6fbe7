/**
 * Haptic Feedback
 */

export type ImpactStyle = 'light' | 'medium' | 'heavy';

export interface HapticFeedback {
  impactOccurred(style: ImpactStyle): void;
}

const VIBRATION_MS: Record<ImpactStyle, number> = {
  light: 10,
  medium: 20,
  heavy: 40,
};

/**
 * Vibration API backed feedback. Does nothing where the API is missing.
 */
export const navigatorHaptics: HapticFeedback = {
  impactOccurred(style) {
    if (typeof navigator !== 'undefined' && typeof navigator.vibrate === 'function') {
      navigator.vibrate(VIBRATION_MS[style]);
    }
  },
};
