/**
 * Waypoint - scene graph navigation for end-to-end UI tests
 */

// Core types
export type {
  Result,
  CallSite,
  FailureCode,
  NavigationFailure,
  FailureRecorder,
  DeviceConfig,
  WaitOptions,
  WaypointConfig,
  WalkResult,
  SceneCapture,
  ArtifactError,
  BrowserError,
  ConfigError,
} from './types.ts';

// Result utilities
export { ok, err, fromPromise, match } from './result.ts';

// Scene graph
export {
  createSceneGraph,
  createDirectedGraph,
  breadthFirstPath,
  SceneGraphError,
} from './graph/index.ts';
export type {
  SceneGraph,
  SceneGraphOptions,
  NavigatorOptions,
  Navigator,
  NodeVisitor,
  GotoOptions,
  Route,
  SceneNode,
  SceneBuilder,
  EdgeOptions,
  DirectedGraph,
  PathFinder,
  SceneGraphErrorCode,
} from './graph/index.ts';

// UI drivers
export { createDryDriver, createPlaywrightDriver, waitForElement, DEFAULT_WAIT } from './driver/index.ts';
export type { UiDriver, UiElement, Gesture, SwipeDirection } from './driver/index.ts';

// Failure reporting
export { createFailureLog, formatFailure, type FailureLog } from './report/failures.ts';
export { captureCallSite, formatSite } from './site.ts';

// Graph definitions
export { defineGraph, instantiateGraph, loadGraphDefinition, validateGraphDefinition } from './definition/index.ts';
export type { GraphDefinition, GraphSummary, LoadError } from './definition/index.ts';

// Screenshot walk
export { walkGraph, captureScenes, type WalkOptions } from './walk/runner.ts';

// Artifacts
export { createArtifactStore, type ArtifactStore } from './artifacts/store.ts';

// Config
export { defineConfig, loadConfig, getDeviceConfig, getWaitOptions } from './config/index.ts';
