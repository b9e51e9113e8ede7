/**
 * Default configuration presets.
 */

import type { DeviceConfig, WaitOptions, WaypointConfig } from '../types.ts';

export const DEVICE_PRESETS = {
  desktop: {
    viewport: { width: 1920, height: 1080 },
    deviceScaleFactor: 1,
    isMobile: false,
    hasTouch: false,
  },
  laptop: {
    viewport: { width: 1440, height: 900 },
    deviceScaleFactor: 2,
    isMobile: false,
    hasTouch: false,
  },
  tablet: {
    viewport: { width: 768, height: 1024 },
    deviceScaleFactor: 2,
    isMobile: true,
    hasTouch: true,
  },
  mobile: {
    viewport: { width: 390, height: 844 },
    deviceScaleFactor: 3,
    isMobile: true,
    hasTouch: true,
  },
} as const satisfies Record<string, DeviceConfig>;

export const DEFAULT_CONFIG: WaypointConfig = {
  navigation: {
    guardTimeout: 5000,
    pollInterval: 100,
  },
  devices: DEVICE_PRESETS,
  output: {
    dir: './waypoint-screens',
  },
  graphs: {
    dir: './graphs',
    pattern: '**/*.graph.ts',
  },
};

export const getDeviceConfig = (
  name: string,
  config: WaypointConfig = DEFAULT_CONFIG
): DeviceConfig | null => config.devices[name] ?? null;

export const getWaitOptions = (config: WaypointConfig = DEFAULT_CONFIG): WaitOptions => ({
  timeout: config.navigation.guardTimeout,
  pollInterval: config.navigation.pollInterval,
});
