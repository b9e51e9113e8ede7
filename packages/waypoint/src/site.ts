/**
 * Call-site capture for failure attribution.
 *
 * Every declaration and navigation API takes an optional `CallSite`. When it
 * is left out, the site is read from the V8 stack of the calling frame.
 */

import { fileURLToPath } from 'node:url';
import type { CallSite } from './types.ts';

export const UNKNOWN_SITE: CallSite = { file: '<unknown>', line: 0 };

// "    at fn (/abs/file.ts:12:5)" or "    at /abs/file.ts:12:5"
const FRAME_PATTERN = /^\s*at (?:.*?\()?(.+?):(\d+):\d+\)?$/;

const toPath = (location: string): string =>
  location.startsWith('file://') ? fileURLToPath(location) : location;

export const parseFrame = (frame: string): CallSite | null => {
  const found = FRAME_PATTERN.exec(frame);
  if (!found) return null;
  const [, location, line] = found;
  if (location === undefined || line === undefined) return null;
  return { file: toPath(location), line: Number(line) };
};

/**
 * Site of the function that called the caller of `captureCallSite`,
 * `skip` frames further up.
 */
export const captureCallSite = (skip = 0): CallSite => {
  const stack = new Error().stack;
  if (stack === undefined) return UNKNOWN_SITE;

  // [0] "Error", [1] this function, [2] its caller, [3] the caller's caller
  const frame = stack.split('\n')[3 + skip];
  if (frame === undefined) return UNKNOWN_SITE;
  return parseFrame(frame) ?? UNKNOWN_SITE;
};

export const formatSite = (site: CallSite): string => `${site.file}:${site.line}`;
