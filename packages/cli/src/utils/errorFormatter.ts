/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { ProvisionError, errorMessage } from '@provision/core';

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional array of actionable suggestions
 * @returns never - always calls process.exit(1)
 *
 * @example
 * exitWithError('Dependency cycle detected: a -> b -> a', [
 *   'Remove one of the dependsOn entries along the cycle'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(formatError(title, nextSteps));
  process.exit(1);
}

export function formatError(title: string, nextSteps?: string[]): string {
  const lines = [`✗ ${title}`];

  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }

  return lines.join('\n');
}

/**
 * Title and next steps for an error that aborts the run before any resource
 * is touched.
 */
export function describeFatalError(error: unknown): { title: string; nextSteps: string[] } {
  if (error instanceof ProvisionError) {
    const nextSteps = error.suggestion ? [error.suggestion] : [];
    const filePath = error.context.filePath;
    if (typeof filePath === 'string' && !error.message.includes(filePath)) {
      nextSteps.push(`Check ${filePath}`);
    }
    return { title: error.message, nextSteps };
  }
  return { title: errorMessage(error), nextSteps: [] };
}
