import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, mergeConfig, type ConfigOverrides } from './loader.ts';
import { DEFAULT_CONFIG, DEVICE_PRESETS, getDeviceConfig } from './defaults.ts';

let cwd: string;

beforeEach(async () => {
  cwd = await mkdtemp(join(tmpdir(), 'waypoint-config-'));
});

afterEach(async () => {
  await rm(cwd, { recursive: true, force: true });
});

describe('loadConfig', () => {
  test('falls back to defaults without a config file', async () => {
    expect(await loadConfig(cwd)).toEqual({ ok: true, value: DEFAULT_CONFIG });
  });

  test('merges a config file over the defaults', async () => {
    await writeFile(
      join(cwd, 'waypoint.config.mjs'),
      "export default { navigation: { guardTimeout: 1500 }, output: { dir: './shots' } };\n"
    );

    const result = await loadConfig(cwd);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.navigation).toEqual({ guardTimeout: 1500, pollInterval: 100 });
      expect(result.value.output.dir).toBe('./shots');
      expect(result.value.graphs).toEqual(DEFAULT_CONFIG.graphs);
    }
  });

  test('rejects a config file without a default object', async () => {
    const path = join(cwd, 'waypoint.config.mjs');
    await writeFile(path, 'export default 42;\n');

    expect(await loadConfig(cwd)).toEqual({
      ok: false,
      error: { code: 'CONFIG_INVALID', message: 'Config file must export a default object', path },
    });
  });

  test('reports a config file that fails to load', async () => {
    await writeFile(join(cwd, 'waypoint.config.mjs'), "throw new Error('bad config');\n");

    const result = await loadConfig(cwd);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('CONFIG_LOAD_FAILED');
      expect(result.error.message).toBe('bad config');
    }
  });
});

describe('mergeConfig', () => {
  test('adds custom devices next to the presets', () => {
    const overrides: ConfigOverrides = {
      devices: {
        kiosk: {
          viewport: { width: 1080, height: 1920 },
          deviceScaleFactor: 1,
          isMobile: false,
          hasTouch: true,
        },
      },
    };

    const config = mergeConfig(DEFAULT_CONFIG, overrides);

    expect(getDeviceConfig('kiosk', config)).toEqual({
      viewport: { width: 1080, height: 1920 },
      deviceScaleFactor: 1,
      isMobile: false,
      hasTouch: true,
    });
    expect(getDeviceConfig('mobile', config)).toEqual(DEVICE_PRESETS.mobile);
  });

  test('keeps every section when nothing is overridden', () => {
    expect(mergeConfig(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });
});
