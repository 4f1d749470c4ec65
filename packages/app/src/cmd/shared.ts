import { ExtraVarsError } from '@extravars/core';
import { ANSI } from '../utils';

/**
 * One-line report for a failed command. Known extra-vars failures are user
 * errors; anything else is reported as fatal.
 */
export function formatFailure(error: unknown, color: boolean): string {
  if (error instanceof ExtraVarsError) {
    const label = color ? `${ANSI.red}Error${ANSI.reset}` : 'Error';
    return `${label}: ${error.message}`;
  }
  return `Fatal error: ${error instanceof Error ? error.message : String(error)}`;
}
