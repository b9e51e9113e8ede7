/**
 * The scene graph: a shared map of the app's states and how to move between them.
 *
 * Scenes are registered eagerly, but their builders only run when the graph
 * compiles, so edges may name scenes declared further down the file.
 * Compilation happens once, on the first `navigator()` call.
 */

import type { CallSite, FailureRecorder, WaitOptions } from '../types.ts';
import { DEFAULT_WAIT } from '../driver/element.ts';
import { createFailure } from '../report/failures.ts';
import { captureCallSite } from '../site.ts';
import { createDirectedGraph, type DirectedGraph } from './directed-graph.ts';
import { SceneGraphError } from './errors.ts';
import { createNavigator, type Navigator } from './navigator.ts';
import { breadthFirstPath, type PathFinder } from './path.ts';
import { createScene, type Scene, type SceneBuilder } from './scene.ts';

export interface SceneGraphOptions {
  readonly initialScene?: string;
  readonly pathFinder?: PathFinder;
}

export interface NavigatorOptions {
  readonly recorder: FailureRecorder;
  /** Defaults to the graph's initial scene. */
  readonly startingAt?: string;
  readonly wait?: WaitOptions;
  readonly site?: CallSite;
}

export interface SceneGraph {
  initialSceneName: string | null;
  readonly compiled: boolean;
  createScene(name: string, builder: SceneBuilder, site?: CallSite): void;
  compile(): void;
  navigator(options: NavigatorOptions): Navigator;
  hasScene(name: string): boolean;
  sceneNames(): readonly string[];
  /** Current shortest route between two scenes, without moving anything. */
  route(from: string, to: string): readonly string[];
  edgeCount(): number;
}

/** What a navigator may reach into. */
export interface GraphInternals {
  readonly arcs: DirectedGraph;
  scene(name: string): Scene | undefined;
  sceneNames(): readonly string[];
  initialSceneName(): string | null;
  findPath(from: string, to: string): readonly string[];
}

export const createSceneGraph = (options: SceneGraphOptions = {}): SceneGraph => {
  const scenes = new Map<string, Scene>();
  const arcs = createDirectedGraph();
  const pathFinder = options.pathFinder ?? breadthFirstPath;
  let compiled = false;

  const owner = { hasScene: (name: string) => scenes.has(name) };

  const internals: GraphInternals = {
    arcs,
    scene: (name) => scenes.get(name),
    sceneNames: () => [...scenes.keys()],
    initialSceneName: () => graph.initialSceneName,
    findPath: (from, to) => pathFinder(arcs, from, to),
  };

  const compile = (): void => {
    if (compiled) return;
    compiled = true;

    const all = [...scenes.values()];
    for (const scene of all) {
      arcs.addVertex(scene.name);
    }

    for (const scene of all) {
      scene.build();
    }

    for (const scene of all) {
      for (const to of scene.edges.keys()) {
        arcs.addArc(scene.name, to);
      }
    }
  };

  const graph: SceneGraph = {
    initialSceneName: options.initialScene ?? null,

    get compiled() {
      return compiled;
    },

    createScene(name, builder, site = captureCallSite()) {
      if (compiled) {
        throw new SceneGraphError(
          'GRAPH_COMPILED',
          `Cannot create scene '${name}' after the graph has been compiled`,
          site
        );
      }
      if (scenes.has(name)) {
        throw new SceneGraphError('DUPLICATE_SCENE', `Scene '${name}' has already been created`, site);
      }
      scenes.set(name, createScene(owner, name, builder, site));
    },

    compile,

    navigator({ recorder, startingAt, wait = DEFAULT_WAIT, site = captureCallSite() }) {
      compile();

      const name = startingAt ?? graph.initialSceneName;
      const initial = name === null ? undefined : scenes.get(name);
      if (!initial) {
        const message = "The app's initial state couldn't be established.";
        recorder.record(createFailure('NO_INITIAL_SCENE', message, site));
        throw new SceneGraphError('NO_INITIAL_SCENE', message, site);
      }

      return createNavigator(internals, { recorder, wait, initial: initial.name });
    },

    hasScene: owner.hasScene,

    sceneNames: internals.sceneNames,

    route(from, to) {
      compile();
      return internals.findPath(from, to);
    },

    edgeCount() {
      let count = 0;
      for (const scene of scenes.values()) {
        count += scene.edges.size;
      }
      return count;
    },
  };

  return graph;
};
