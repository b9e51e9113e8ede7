import { describe, test, expect, vi } from 'vitest';
import { waitForElement, type UiElement } from './element.ts';
import { createDryDriver } from './dry.ts';

const elementWith = (exists: () => Promise<boolean>): UiElement => ({
  description: 'save button',
  exists,
  tap: async () => {},
  doubleTap: async () => {},
  typeText: async () => {},
  swipe: async () => {},
});

describe('waitForElement', () => {
  test('resolves as soon as the element exists', async () => {
    const exists = vi.fn(async () => true);

    expect(await waitForElement(elementWith(exists), { timeout: 1000, pollInterval: 50 })).toBe(true);
    expect(exists).toHaveBeenCalledTimes(1);
  });

  test('keeps polling until the element appears', async () => {
    const exists = vi
      .fn<() => Promise<boolean>>()
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(false)
      .mockResolvedValue(true);

    expect(await waitForElement(elementWith(exists), { timeout: 1000, pollInterval: 1 })).toBe(true);
    expect(exists).toHaveBeenCalledTimes(3);
  });

  test('gives up after the timeout', async () => {
    const exists = vi.fn(async () => false);
    const started = Date.now();

    expect(await waitForElement(elementWith(exists), { timeout: 20, pollInterval: 5 })).toBe(false);
    expect(Date.now() - started).toBeGreaterThanOrEqual(20);
    expect(exists.mock.calls.length).toBeGreaterThan(1);
  });
});

describe('createDryDriver', () => {
  test('elements always exist and describe themselves by selector', async () => {
    const element = createDryDriver().element('#save');

    expect(element.description).toBe('#save');
    expect(await element.exists()).toBe(true);
    await expect(element.tap()).resolves.toBeUndefined();
  });

  test('keeps an explicit description', () => {
    expect(createDryDriver().element('#save', 'save button').description).toBe('save button');
  });
});
