/**
 * Configuration errors
 */

import type { z } from 'zod';

/** One failed check, addressed by its dotted config path */
export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Invalid or missing configuration. Raised at construction time, before any
 * sample is produced.
 */
export class ConfigError extends Error {
  constructor(
    public readonly context: string,
    public readonly issues: ConfigIssue[] = []
  ) {
    super(
      issues.length > 0
        ? `Invalid configuration for ${context}: ${issues.map(formatIssue).join('; ')}`
        : `Invalid configuration for ${context}`
    );
    this.name = 'ConfigError';
  }

  /**
   * Build from a failed zod parse
   */
  static fromZodError(context: string, error: z.ZodError): ConfigError {
    return new ConfigError(
      context,
      error.errors.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  toJSON(): { name: string; context: string; issues: ConfigIssue[] } {
    return { name: this.name, context: this.context, issues: this.issues };
  }
}

function formatIssue(issue: ConfigIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}
