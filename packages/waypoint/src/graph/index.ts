/**
 * Graph module exports.
 */

export { createSceneGraph, type SceneGraph, type SceneGraphOptions, type NavigatorOptions } from './scene-graph.ts';
export { type Navigator, type NodeVisitor, type GotoOptions, type Route } from './navigator.ts';
export { type SceneNode, type SceneBuilder, type EdgeOptions } from './scene.ts';
export { createDirectedGraph, type DirectedGraph } from './directed-graph.ts';
export { breadthFirstPath, type PathFinder } from './path.ts';
export { SceneGraphError, type SceneGraphErrorCode } from './errors.ts';
