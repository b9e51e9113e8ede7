export {
  waitForElement,
  DEFAULT_WAIT,
  type UiElement,
  type UiDriver,
  type Gesture,
  type SwipeDirection,
} from './element.ts';
export { createPlaywrightDriver, locatorElement, type LocatorLike, type PageLike } from './playwright.ts';
export { createDryDriver, dryElement, type DryElement } from './dry.ts';
