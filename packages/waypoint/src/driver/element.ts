/**
 * UI driver boundary.
 *
 * The graph never talks to a browser or device directly. It holds UiElements
 * handed out by a UiDriver and only asks them to exist or to be acted on.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { WaitOptions } from '../types.ts';

export type SwipeDirection = 'left' | 'right' | 'up' | 'down';

export interface UiElement {
  /** Human-readable label used in failure messages. */
  readonly description: string;
  exists(): Promise<boolean>;
  tap(): Promise<void>;
  doubleTap(): Promise<void>;
  typeText(text: string): Promise<void>;
  swipe(direction: SwipeDirection): Promise<void>;
}

export interface UiDriver {
  element(selector: string, description?: string): UiElement;
}

/** A side-effecting UI interaction performed on an edge or as a back action. */
export type Gesture = () => Promise<void> | void;

export const DEFAULT_WAIT: WaitOptions = {
  timeout: 5000,
  pollInterval: 100,
};

/**
 * Poll `element.exists()` until it holds or the timeout runs out.
 * The wait cannot be cut short; on expiry it resolves to false.
 */
export const waitForElement = async (
  element: UiElement,
  options: WaitOptions = DEFAULT_WAIT
): Promise<boolean> => {
  const deadline = Date.now() + options.timeout;

  while (true) {
    if (await element.exists()) return true;
    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    await sleep(Math.min(options.pollInterval, remaining));
  }
};
