import { describe, test, expect } from 'vitest';
import { DEVICE_PRESETS, DEFAULT_CONFIG, getDeviceConfig, getWaitOptions } from './defaults.ts';
import { mergeConfig } from './loader.ts';

describe('device presets', () => {
  test('desktop is a large non-touch viewport', () => {
    expect(DEVICE_PRESETS.desktop.viewport).toEqual({ width: 1920, height: 1080 });
    expect(DEVICE_PRESETS.desktop.hasTouch).toBe(false);
  });

  test('getDeviceConfig finds presets by name', () => {
    expect(getDeviceConfig('mobile')?.viewport.width).toBe(390);
    expect(getDeviceConfig('watch')).toBeNull();
  });

  test('getDeviceConfig looks in the given config', () => {
    const config = mergeConfig(DEFAULT_CONFIG, {
      devices: {
        kiosk: { viewport: { width: 1080, height: 1920 }, deviceScaleFactor: 1, isMobile: false, hasTouch: true },
      },
    });
    expect(getDeviceConfig('kiosk', config)?.hasTouch).toBe(true);
    expect(getDeviceConfig('desktop', config)).not.toBeNull();
  });
});

describe('default config', () => {
  test('waits five seconds for guards', () => {
    expect(getWaitOptions()).toEqual({ timeout: 5000, pollInterval: 100 });
  });

  test('looks for graph files under ./graphs', () => {
    expect(DEFAULT_CONFIG.graphs).toEqual({ dir: './graphs', pattern: '**/*.graph.ts' });
  });
});
