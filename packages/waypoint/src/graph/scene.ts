/**
 * Scene nodes.
 *
 * A scene is one distinguishable state of the app under test. Its builder runs
 * once, when the graph compiles, and declares the edges out of the scene with
 * the gesture methods below.
 */

import type { CallSite, FailureRecorder, WaitOptions } from '../types.ts';
import { waitForElement, type Gesture, type SwipeDirection, type UiElement } from '../driver/element.ts';
import { createFailure } from '../report/failures.ts';
import { captureCallSite, formatSite } from '../site.ts';
import { SceneGraphError } from './errors.ts';

/** What an edge needs from the navigator while it runs. */
export interface HopContext {
  readonly recorder: FailureRecorder;
  /** Where the navigation that triggered this hop was requested. */
  readonly site: CallSite;
  readonly wait: WaitOptions;
}

export type EdgeAction = (hop: HopContext) => Promise<void>;

export type SceneBuilder = (scene: SceneNode) => void;

export interface EdgeOptions {
  /** Waited for before the gesture runs. */
  readonly element?: UiElement;
  readonly site?: CallSite;
}

/** The handle a scene builder works with. */
export interface SceneNode {
  readonly name: string;
  readonly declarationSite: CallSite;

  /**
   * Returns to wherever this scene was reached from. Useful when the same
   * screen opens from several places and has a back button.
   */
  backAction: Gesture | null;

  /** Once left, this scene is never the target of another scene's back action. Menus, dialogs. */
  dismissOnUse: boolean;

  /** Must exist shortly after arriving here. */
  existsWhen: UiElement | null;

  gesture(to: string, gesture: Gesture, options?: EdgeOptions): void;
  noop(to: string, site?: CallSite): void;
  tap(element: UiElement, to: string, site?: CallSite): void;
  doubleTap(element: UiElement, to: string, site?: CallSite): void;
  typeText(text: string, element: UiElement, to: string, site?: CallSite): void;
  swipeLeft(element: UiElement, to: string, site?: CallSite): void;
  swipeRight(element: UiElement, to: string, site?: CallSite): void;
  swipeUp(element: UiElement, to: string, site?: CallSite): void;
  swipeDown(element: UiElement, to: string, site?: CallSite): void;
}

/** Scene as the graph and navigator see it. */
export interface Scene extends SceneNode {
  readonly edges: ReadonlyMap<string, EdgeAction>;
  /** Target of the live back-edge, if one has been grafted. */
  returnAnchor: string | null;
  build(): void;
  declares(to: string): boolean;
  /** Declared edge to `to`, else the back action when `to` is the live anchor. */
  actionTo(to: string): EdgeAction | undefined;
}

/** Lookup into the owning graph; scenes never hold other scenes. */
export interface SceneOwner {
  hasScene(name: string): boolean;
}

export const createScene = (
  owner: SceneOwner,
  name: string,
  builder: SceneBuilder,
  declarationSite: CallSite
): Scene => {
  const edges = new Map<string, EdgeAction>();

  const addEdge = (to: string, edge: EdgeAction, site: CallSite): void => {
    if (!owner.hasScene(to)) {
      throw new SceneGraphError(
        'UNDECLARED_DESTINATION',
        `Destination scene '${to}' has not been created anywhere`,
        site
      );
    }
    edges.set(to, edge);
  };

  const scene: Scene = {
    name,
    declarationSite,
    backAction: null,
    dismissOnUse: false,
    existsWhen: null,
    returnAnchor: null,
    edges,

    build() {
      builder(scene);
    },

    declares(to) {
      return edges.has(to);
    },

    actionTo(to) {
      const declared = edges.get(to);
      if (declared) return declared;

      const back = scene.backAction;
      if (back !== null && scene.returnAnchor === to) {
        return async () => {
          await back();
        };
      }
      return undefined;
    },

    gesture(to, gesture, options = {}) {
      const site = options.site ?? captureCallSite();
      const { element } = options;

      addEdge(
        to,
        async (hop) => {
          if (element && !(await waitForElement(element, hop.wait))) {
            hop.recorder.record(
              createFailure('ELEMENT_NOT_FOUND', `Cannot find ${element.description}`, site)
            );
            hop.recorder.record(
              createFailure(
                'EDGE_BLOCKED',
                `Cannot get from ${name} to ${to}. See ${formatSite(site)}`,
                hop.site
              )
            );
          }
          await gesture();
        },
        site
      );
    },

    noop(to, site = captureCallSite()) {
      scene.gesture(to, () => {}, { site });
    },

    tap(element, to, site = captureCallSite()) {
      scene.gesture(to, () => element.tap(), { element, site });
    },

    doubleTap(element, to, site = captureCallSite()) {
      scene.gesture(to, () => element.doubleTap(), { element, site });
    },

    typeText(text, element, to, site = captureCallSite()) {
      scene.gesture(to, () => element.typeText(text), { element, site });
    },

    swipeLeft(element, to, site = captureCallSite()) {
      swipe(element, 'left', to, site);
    },

    swipeRight(element, to, site = captureCallSite()) {
      swipe(element, 'right', to, site);
    },

    swipeUp(element, to, site = captureCallSite()) {
      swipe(element, 'up', to, site);
    },

    swipeDown(element, to, site = captureCallSite()) {
      swipe(element, 'down', to, site);
    },
  };

  const swipe = (element: UiElement, direction: SwipeDirection, to: string, site: CallSite): void => {
    scene.gesture(to, () => element.swipe(direction), { element, site });
  };

  return scene;
};
