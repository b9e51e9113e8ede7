/**
 * Route command implementation.
 * Rehearses a `goto` against the dry driver, so the printed route is the one
 * a navigator starting at `from` would take.
 */

import type { RouteCommand } from '../../types.ts';
import { createDryDriver } from '../../driver/dry.ts';
import { instantiateGraph, loadGraphDefinition, summarizeGraph } from '../../definition/index.ts';
import { createFailureLog } from '../../report/failures.ts';
import { formatRoute } from '../format.ts';

export const executeRoute = async (command: RouteCommand): Promise<number> => {
  const loadResult = await loadGraphDefinition(command.graphFile);
  if (!loadResult.ok) {
    console.error(`Failed to load graph: ${loadResult.error.message}`);
    return 1;
  }

  const definition = loadResult.value;
  const checked = summarizeGraph(definition, command.graphFile);
  if (!checked.ok) {
    console.error(`Invalid graph: ${checked.error.message}`);
    return 1;
  }

  const graph = instantiateGraph(definition, createDryDriver());
  graph.compile();

  const from = command.from ?? definition.initialScene;
  if (!graph.hasScene(from)) {
    console.error(`Unknown scene: ${from}`);
    return 1;
  }

  const log = createFailureLog();
  const navigator = graph.navigator({ recorder: log, startingAt: from });
  const result = await navigator.goto(command.to);

  if (!result.ok) {
    console.error(log.format());
    return 1;
  }

  console.log(formatRoute([from, ...result.value.hops]));
  return 0;
};
