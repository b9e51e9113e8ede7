/**
 * Configuration file loader.
 * Looks for waypoint.config.{ts,js,mjs} in the working directory.
 */

import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Result, DeviceConfig, WaypointConfig, ConfigError } from '../types.ts';
import { ok, err } from '../result.ts';
import { DEFAULT_CONFIG } from './defaults.ts';

export interface ConfigOverrides {
  readonly navigation?: Partial<WaypointConfig['navigation']>;
  /** Added to the presets; a name already there replaces the preset. */
  readonly devices?: Readonly<Record<string, DeviceConfig>>;
  readonly output?: Partial<WaypointConfig['output']>;
  readonly graphs?: Partial<WaypointConfig['graphs']>;
}

const CONFIG_FILENAMES = [
  'waypoint.config.ts',
  'waypoint.config.js',
  'waypoint.config.mjs',
] as const;

const findConfigFile = async (cwd: string): Promise<string | null> => {
  for (const filename of CONFIG_FILENAMES) {
    const path = join(cwd, filename);
    try {
      await access(path);
      return path;
    } catch {
      // not there, try the next name
    }
  }
  return null;
};

const isConfigOverrides = (value: unknown): value is ConfigOverrides =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const loadConfigFile = async (
  path: string
): Promise<Result<ConfigOverrides, ConfigError>> => {
  let loaded: unknown;
  try {
    const module: { default?: unknown } = await import(pathToFileURL(path).href);
    loaded = module.default;
  } catch (e) {
    return err({
      code: 'CONFIG_LOAD_FAILED',
      message: e instanceof Error ? e.message : 'Failed to load config file',
      path,
    });
  }

  if (!isConfigOverrides(loaded)) {
    return err({
      code: 'CONFIG_INVALID',
      message: 'Config file must export a default object',
      path,
    });
  }
  return ok(loaded);
};

export const mergeConfig = (
  base: WaypointConfig,
  override: ConfigOverrides
): WaypointConfig => ({
  navigation: { ...base.navigation, ...override.navigation },
  devices: { ...base.devices, ...override.devices },
  output: { ...base.output, ...override.output },
  graphs: { ...base.graphs, ...override.graphs },
});

export const loadConfig = async (
  cwd: string = process.cwd()
): Promise<Result<WaypointConfig, ConfigError>> => {
  const configPath = await findConfigFile(cwd);

  if (configPath === null) {
    return ok(DEFAULT_CONFIG);
  }

  const configResult = await loadConfigFile(configPath);
  if (!configResult.ok) {
    return configResult;
  }

  return ok(mergeConfig(DEFAULT_CONFIG, configResult.value));
};

export const defineConfig = (config: ConfigOverrides): ConfigOverrides => config;
