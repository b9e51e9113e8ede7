/**
 * Config module exports.
 */

export { loadConfig, defineConfig, mergeConfig, type ConfigOverrides } from './loader.ts';
export { DEFAULT_CONFIG, DEVICE_PRESETS, getDeviceConfig, getWaitOptions } from './defaults.ts';
