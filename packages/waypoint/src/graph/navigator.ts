/**
 * The Navigator gets a test from scene to scene. You `goto` scenes, visit a
 * set of them, or visit them all; mostly you just goto. If the test moves the
 * app by other means, tell the navigator where it ended up with `nowAt`.
 *
 * A navigator belongs to one test and must not be driven from two places at
 * once: every hop, including its graph mutations, finishes before the next
 * route is computed.
 */

import type { CallSite, FailureRecorder, NavigationFailure, Result, WaitOptions } from '../types.ts';
import { ok, err } from '../result.ts';
import { createFailure } from '../report/failures.ts';
import { captureCallSite } from '../site.ts';
import { waitForElement } from '../driver/element.ts';
import { SceneGraphError } from './errors.ts';
import type { GraphInternals } from './scene-graph.ts';
import type { Scene } from './scene.ts';

/** Called with the name of each scene the navigator leaves. */
export type NodeVisitor = (sceneName: string) => void | Promise<void>;

export interface GotoOptions {
  readonly visitor?: NodeVisitor;
  readonly site?: CallSite;
}

export interface Route {
  readonly from: string;
  readonly to: string;
  /** Scenes entered, in order; empty when already there. */
  readonly hops: readonly string[];
}

export interface Navigator {
  readonly current: string;
  readonly returnAnchor: string;
  goto(name: string, options?: GotoOptions): Promise<Result<Route, NavigationFailure>>;
  nowAt(name: string, site?: CallSite): Result<string, NavigationFailure>;
  /** Visits each requested scene once; resolves to the names visited, in order. */
  visitNodes(names: readonly string[], visitor: NodeVisitor, site?: CallSite): Promise<readonly string[]>;
  visitAll(visitor: NodeVisitor, site?: CallSite): Promise<readonly string[]>;
  /** Goes back to the graph's initial scene, if it has one. */
  revert(site?: CallSite): Promise<Result<Route, NavigationFailure>>;
}

export interface NavigatorState {
  readonly recorder: FailureRecorder;
  readonly wait: WaitOptions;
  readonly initial: string;
}

const noopVisitor: NodeVisitor = () => {};

export const createNavigator = (graph: GraphInternals, state: NavigatorState): Navigator => {
  const { recorder, wait } = state;
  let current = state.initial;
  let returnAnchor = state.initial;

  const sceneNamed = (name: string, site: CallSite): Scene => {
    const scene = graph.scene(name);
    if (!scene) {
      throw new SceneGraphError('MISSING_EDGE', `Route passes through unknown scene '${name}'`, site);
    }
    return scene;
  };

  const fail = (failure: NavigationFailure): Result<never, NavigationFailure> => {
    recorder.record(failure);
    return err(failure);
  };

  const hop = async (
    from: Scene,
    next: Scene,
    visitor: NodeVisitor,
    site: CallSite
  ): Promise<NavigationFailure | null> => {
    if (!from.dismissOnUse) {
      returnAnchor = from.name;
    }

    const action = from.actionTo(next.name);
    if (!action) {
      throw new SceneGraphError(
        'MISSING_EDGE',
        `Scene '${from.name}' has no edge to '${next.name}'`,
        from.declarationSite
      );
    }

    try {
      await action({ recorder, site, wait });
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      const failure = createFailure(
        'ACTION_FAILED',
        `Moving from ${from.name} to ${next.name} failed: ${reason}`,
        site
      );
      recorder.record(failure);
      return failure;
    }

    const guard = next.existsWhen;
    if (guard) {
      try {
        if (!(await waitForElement(guard, wait))) {
          recorder.record(
            createFailure('GUARD_TIMEOUT', `Cannot find ${guard.description} in ${next.name}`, next.declarationSite)
          );
        }
      } catch (e) {
        // The action already ran, so the app is in `next` whatever the guard says
        const reason = e instanceof Error ? e.message : String(e);
        recorder.record(
          createFailure(
            'GUARD_FAILED',
            `Cannot check ${guard.description} in ${next.name}: ${reason}`,
            next.declarationSite
          )
        );
      }
    }

    if (next.backAction !== null && next.returnAnchor === null && returnAnchor !== next.name) {
      next.returnAnchor = returnAnchor;
      graph.arcs.addArc(next.name, returnAnchor);
    }

    if (from.backAction !== null && from.returnAnchor === next.name) {
      from.returnAnchor = null;
      if (!from.declares(next.name)) {
        graph.arcs.removeArc(from.name, next.name);
      }
    }

    await visitor(from.name);
    current = next.name;
    return null;
  };

  const goto = async (name: string, options: GotoOptions = {}): Promise<Result<Route, NavigationFailure>> => {
    const site = options.site ?? captureCallSite();
    const visitor = options.visitor ?? noopVisitor;

    if (!graph.scene(name)) {
      return fail(createFailure('UNKNOWN_DESTINATION', `Cannot route to ${name}, because it doesn't exist`, site));
    }

    const start = current;
    const path = graph.findPath(start, name);
    if (path.length === 0) {
      return fail(createFailure('NO_ROUTE', `Cannot route from ${start} to ${name}`, site));
    }

    const hops = path.slice(1);
    for (const nextName of hops) {
      const failure = await hop(sceneNamed(current, site), sceneNamed(nextName, site), visitor, site);
      if (failure) return err(failure);
    }

    return ok({ from: start, to: name, hops });
  };

  const visitNodes = async (
    names: readonly string[],
    visitor: NodeVisitor,
    site: CallSite
  ): Promise<readonly string[]> => {
    const requested = new Set(names);
    const visited = new Set<string>();
    const order: string[] = [];

    const visit = async (name: string): Promise<void> => {
      const first = !visited.has(name);
      visited.add(name);
      if (first && requested.has(name)) {
        order.push(name);
        await visitor(name);
      }
    };

    for (const name of requested) {
      if (visited.has(name)) continue;
      const result = await goto(name, { visitor: visit, site });
      // Departures only cover scenes we leave; count the one we stopped at too
      if (result.ok) await visit(current);
    }

    return order;
  };

  return {
    get current() {
      return current;
    },

    get returnAnchor() {
      return returnAnchor;
    },

    goto,

    nowAt(name, site = captureCallSite()) {
      if (!graph.scene(name)) {
        return fail(createFailure('UNKNOWN_SCENE', `Cannot force to unknown ${name}. Currently at ${current}`, site));
      }
      current = name;
      return ok(name);
    },

    visitNodes(names, visitor, site = captureCallSite()) {
      return visitNodes(names, visitor, site);
    },

    visitAll(visitor, site = captureCallSite()) {
      return visitNodes(graph.sceneNames(), visitor, site);
    },

    async revert(site = captureCallSite()) {
      const initial = graph.initialSceneName();
      if (initial === null) {
        return ok({ from: current, to: current, hops: [] });
      }
      return goto(initial, { site });
    },
  };
};
