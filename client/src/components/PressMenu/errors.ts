/**
 * Press Menu Errors
 */

import type { ZodError } from 'zod';

/**
 * Thrown when host code builds a menu item, configuration or settings object
 * from invalid values. Nothing in the presentation pipeline throws this.
 */
export class MenuConfigurationError extends Error {
  readonly issues: string[];

  constructor(subject: string, cause: ZodError) {
    const issues = cause.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    super(`Invalid ${subject}: ${issues.join('; ')}`);
    this.name = 'MenuConfigurationError';
    this.issues = issues;
  }
}
