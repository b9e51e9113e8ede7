/**
 * Driver for running a graph without a browser.
 * Every element exists and every gesture succeeds, so routes and back-edges
 * can be rehearsed from the command line or in tests.
 */

import type { UiDriver, UiElement } from './element.ts';

export interface DryElement extends UiElement {
  readonly selector: string;
}

export const dryElement = (selector: string, description?: string): DryElement => ({
  selector,
  description: description ?? selector,
  exists: async () => true,
  tap: async () => {},
  doubleTap: async () => {},
  typeText: async () => {},
  swipe: async () => {},
});

export const createDryDriver = (): UiDriver => ({
  element: dryElement,
});
