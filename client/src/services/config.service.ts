/**
 * Configuration Service
 *
 * Tunable constants for menu placement, sizing and gesture recognition.
 * Every value has a default; hosts override individual values per interaction.
 */

import { z } from 'zod';
import { MenuConfigurationError } from '../components/PressMenu/errors';

// =============================================================================
// Schemas
// =============================================================================

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const PressMenuSettingsSchema = z
  .object({
    /** Minimum distance between the popup and the viewport edges */
    screenPadding: z.number().nonnegative().default(16),
    /** Gap between the anchor rect and the popup */
    anchorGap: z.number().nonnegative().default(8),
    /** Fade in / fade out duration */
    fadeDurationMs: z.number().int().nonnegative().default(150),
    /** Lower bound for auto-sized popups */
    autoMinWidth: z.number().positive().default(200),
    /** Upper bound for auto-sized popups */
    autoMaxWidth: z.number().positive().default(350),
    /** Width used when a configuration does not name a width mode */
    defaultFixedWidth: z.number().positive().default(250),
    /** Hold duration before a press is recognised */
    longPressDelayMs: z.number().int().positive().default(500),
    /** Pointer travel that cancels a pending long press */
    longPressMoveTolerance: z.number().nonnegative().default(10),
  })
  .refine((settings) => settings.autoMinWidth <= settings.autoMaxWidth, {
    message: 'autoMinWidth must not exceed autoMaxWidth',
    path: ['autoMinWidth'],
  });

// =============================================================================
// Type Exports
// =============================================================================

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type PressMenuSettings = z.infer<typeof PressMenuSettingsSchema>;
export type PressMenuSettingsInput = z.input<typeof PressMenuSettingsSchema>;

// =============================================================================
// Resolution
// =============================================================================

export const DEFAULT_SETTINGS: PressMenuSettings = PressMenuSettingsSchema.parse({});

/**
 * Merge host overrides over the defaults.
 * @throws MenuConfigurationError when an override is out of range
 */
export function resolvePressMenuSettings(overrides?: PressMenuSettingsInput): PressMenuSettings {
  if (!overrides) {
    return DEFAULT_SETTINGS;
  }

  const result = PressMenuSettingsSchema.safeParse(overrides);
  if (!result.success) {
    throw new MenuConfigurationError('press menu settings', result.error);
  }
  return result.data;
}
