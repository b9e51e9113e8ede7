/**
 * Playwright-backed UI driver.
 */

import type { Locator, Mouse } from 'playwright';
import type { SwipeDirection, UiDriver, UiElement } from './element.ts';

/** The slice of a Playwright Locator the driver relies on. */
export type LocatorLike = Pick<Locator, 'click' | 'dblclick' | 'pressSequentially' | 'count' | 'boundingBox'> & {
  page(): { readonly mouse: Pick<Mouse, 'move' | 'down' | 'up'> };
};

export interface PageLike {
  locator(selector: string): LocatorLike;
}

// Fraction of the element's box a swipe travels across
const SWIPE_SPAN = 0.8;
const SWIPE_STEPS = 10;

const swipeOffset = (
  direction: SwipeDirection,
  box: { readonly width: number; readonly height: number }
): { dx: number; dy: number } => {
  const dx = (box.width * SWIPE_SPAN) / 2;
  const dy = (box.height * SWIPE_SPAN) / 2;
  switch (direction) {
    case 'left':
      return { dx: -dx, dy: 0 };
    case 'right':
      return { dx, dy: 0 };
    case 'up':
      return { dx: 0, dy: -dy };
    case 'down':
      return { dx: 0, dy };
  }
};

export const locatorElement = (locator: LocatorLike, description: string): UiElement => ({
  description,

  async exists() {
    return (await locator.count()) > 0;
  },

  async tap() {
    await locator.click();
  },

  async doubleTap() {
    await locator.dblclick();
  },

  async typeText(text) {
    await locator.pressSequentially(text);
  },

  async swipe(direction) {
    const box = await locator.boundingBox();
    if (!box) {
      throw new Error(`Cannot swipe ${direction} on ${description}: element is not visible`);
    }

    const { mouse } = locator.page();
    const startX = box.x + box.width / 2;
    const startY = box.y + box.height / 2;
    const { dx, dy } = swipeOffset(direction, box);

    await mouse.move(startX, startY);
    await mouse.down();
    await mouse.move(startX + dx, startY + dy, { steps: SWIPE_STEPS });
    await mouse.up();
  },
});

export const createPlaywrightDriver = (page: PageLike): UiDriver => ({
  element(selector, description) {
    return locatorElement(page.locator(selector), description ?? selector);
  },
});
