/**
 * Failure recorders.
 */

import type { FailureRecorder, NavigationFailure } from '../types.ts';
import { formatSite } from '../site.ts';

export interface FailureLog extends FailureRecorder {
  readonly failures: readonly NavigationFailure[];
  clear(): void;
  /** One line per failure: `file:line: [CODE] message`. */
  format(): string;
}

export const formatFailure = (failure: NavigationFailure): string =>
  `${formatSite(failure.site)}: [${failure.code}] ${failure.message}`;

export const createFailureLog = (): FailureLog => {
  const failures: NavigationFailure[] = [];

  return {
    get failures() {
      return failures;
    },

    record(failure) {
      failures.push(failure);
    },

    clear() {
      failures.length = 0;
    },

    format() {
      return failures.map(formatFailure).join('\n');
    },
  };
};

export const createFailure = (
  code: NavigationFailure['code'],
  message: string,
  site: NavigationFailure['site']
): NavigationFailure => ({ code, message, site, expected: false });
