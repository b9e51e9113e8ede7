/**
 * Graph definition API.
 *
 * A graph file describes an app once: its scenes, the gestures between them and
 * where it starts. The same file serves every test, the CLI route checks and
 * the screenshot walk; only the UiDriver handed to `build` changes.
 */

import type { UiDriver } from '../driver/element.ts';
import { createSceneGraph, type SceneGraph } from '../graph/scene-graph.ts';
import type { PathFinder } from '../graph/path.ts';

export type GraphBuildFn = (graph: SceneGraph, ui: UiDriver) => void;

export interface GraphDefinition {
  readonly name: string;
  readonly description: string;
  readonly initialScene: string;
  /** Opened relative to the base URL before a walk starts. Defaults to `/`. */
  readonly entry?: string;
  readonly build: GraphBuildFn;
}

/**
 * Define a scene graph.
 *
 * @example
 * ```typescript
 * import { defineGraph } from 'waypoint';
 *
 * export default defineGraph({
 *   name: 'settings',
 *   description: 'Home, settings and the about screen',
 *   initialScene: 'Home',
 *
 *   build(graph, ui) {
 *     graph.createScene('Home', (scene) => {
 *       scene.tap(ui.element('[data-testid="open-settings"]'), 'Settings');
 *     });
 *
 *     graph.createScene('Settings', (scene) => {
 *       scene.tap(ui.element('text=About'), 'About');
 *     });
 *
 *     graph.createScene('About', (scene) => {
 *       scene.existsWhen = ui.element('h1:has-text("About")');
 *       scene.backAction = () => ui.element('[aria-label="Back"]').tap();
 *     });
 *   },
 * });
 * ```
 */
export const defineGraph = (definition: GraphDefinition): GraphDefinition =>
  definition;

/** Build a fresh, uncompiled graph from a definition. */
export const instantiateGraph = (
  definition: GraphDefinition,
  ui: UiDriver,
  pathFinder?: PathFinder
): SceneGraph => {
  const graph = createSceneGraph({ initialScene: definition.initialScene, pathFinder });
  definition.build(graph, ui);
  return graph;
};
