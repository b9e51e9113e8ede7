/**
 * Graph definition module exports.
 */

export { defineGraph, instantiateGraph, type GraphDefinition, type GraphBuildFn } from './define.ts';
export {
  loadGraphDefinition,
  validateGraphDefinition,
  summarizeGraph,
  findGraphFiles,
  type LoadError,
  type GraphSummary,
} from './loader.ts';
