/**
 * Graph file discovery, loading and validation.
 */

import { access } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import fg from 'fast-glob';
import type { Result } from '../types.ts';
import { ok, err } from '../result.ts';
import { createDryDriver } from '../driver/dry.ts';
import { SceneGraphError } from '../graph/errors.ts';
import { instantiateGraph, type GraphDefinition } from './define.ts';

export interface LoadError {
  readonly code: 'FILE_NOT_FOUND' | 'INVALID_GRAPH' | 'LOAD_FAILED';
  readonly message: string;
  readonly path: string;
}

export interface GraphSummary {
  readonly name: string;
  readonly description: string;
  readonly initialScene: string;
  readonly scenes: number;
  readonly edges: number;
  /** Scenes with no declared route from the initial scene. */
  readonly unreachable: readonly string[];
}

const isGraphDefinition = (value: unknown): value is GraphDefinition => {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'name' in value && typeof value.name === 'string' &&
    'description' in value && typeof value.description === 'string' &&
    'initialScene' in value && typeof value.initialScene === 'string' &&
    'build' in value && typeof value.build === 'function'
  );
};

const fileExists = async (path: string): Promise<boolean> => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

export const loadGraphDefinition = async (
  path: string
): Promise<Result<GraphDefinition, LoadError>> => {
  if (!(await fileExists(path))) {
    return err({
      code: 'FILE_NOT_FOUND',
      message: `Graph file not found: ${path}`,
      path,
    });
  }

  let exported: unknown;
  try {
    const absolutePath = isAbsolute(path) ? path : resolve(process.cwd(), path);
    const module: { default?: unknown } = await import(pathToFileURL(absolutePath).href);
    exported = module.default;
  } catch (e) {
    return err({
      code: 'LOAD_FAILED',
      message: e instanceof Error ? e.message : 'Failed to load graph file',
      path,
    });
  }

  if (!isGraphDefinition(exported)) {
    return err({
      code: 'INVALID_GRAPH',
      message: 'Invalid graph definition. Must export default with name, description, initialScene and build function.',
      path,
    });
  }

  return ok(exported);
};

/**
 * Compile a definition against the dry driver. Declaration errors that would
 * abort a test run come back as INVALID_GRAPH.
 */
export const summarizeGraph = (
  definition: GraphDefinition,
  path: string
): Result<GraphSummary, LoadError> => {
  try {
    const graph = instantiateGraph(definition, createDryDriver());
    graph.compile();

    if (!graph.hasScene(definition.initialScene)) {
      return err({
        code: 'INVALID_GRAPH',
        message: `Initial scene '${definition.initialScene}' has not been created`,
        path,
      });
    }

    const names = graph.sceneNames();
    return ok({
      name: definition.name,
      description: definition.description,
      initialScene: definition.initialScene,
      scenes: names.length,
      edges: graph.edgeCount(),
      unreachable: names.filter((name) => graph.route(definition.initialScene, name).length === 0),
    });
  } catch (e) {
    if (e instanceof SceneGraphError) {
      return err({ code: 'INVALID_GRAPH', message: e.message, path });
    }
    throw e;
  }
};

export const validateGraphDefinition = async (
  path: string
): Promise<Result<GraphSummary, LoadError>> => {
  const result = await loadGraphDefinition(path);
  if (!result.ok) {
    return result;
  }
  return summarizeGraph(result.value, path);
};

export const findGraphFiles = async (dir: string, pattern: string): Promise<readonly string[]> => {
  const files = await fg(pattern, { cwd: dir, absolute: false });
  return files.sort();
};
