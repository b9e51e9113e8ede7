import { describe, test, expect, vi } from 'vitest';
import { defineGraph, instantiateGraph } from './define.ts';
import { createDryDriver } from '../driver/dry.ts';
import { createFailureLog } from '../report/failures.ts';
import type { PathFinder } from '../graph/path.ts';
import example from '../../graphs/example.graph.ts';

describe('defineGraph', () => {
  test('returns the definition unchanged', () => {
    const build = vi.fn();
    const definition = defineGraph({
      name: 'test-graph',
      description: 'A test graph',
      initialScene: 'Home',
      build,
    });

    expect(definition.name).toBe('test-graph');
    expect(definition.initialScene).toBe('Home');
    expect(definition.build).toBe(build);
    expect(build).not.toHaveBeenCalled();
  });
});

describe('instantiateGraph', () => {
  test('builds an uncompiled graph with the initial scene set', () => {
    const graph = instantiateGraph(example, createDryDriver());

    expect(graph.compiled).toBe(false);
    expect(graph.initialSceneName).toBe('Home');
    expect(graph.sceneNames()).toEqual(['Home', 'Menu', 'Settings', 'ThemeResults', 'About', 'Help']);
  });

  test('passes the path finder through', () => {
    const pathFinder = vi.fn<PathFinder>(() => []);
    const graph = instantiateGraph(example, createDryDriver(), pathFinder);

    expect(graph.route('Home', 'About')).toEqual([]);
    expect(pathFinder).toHaveBeenCalledWith(expect.anything(), 'Home', 'About');
  });

  test('each call builds a separate graph', () => {
    const first = instantiateGraph(example, createDryDriver());
    const second = instantiateGraph(example, createDryDriver());
    first.compile();

    expect(first.compiled).toBe(true);
    expect(second.compiled).toBe(false);
  });

  test('drives the example graph with the dry driver', async () => {
    const graph = instantiateGraph(example, createDryDriver());
    const log = createFailureLog();
    const navigator = graph.navigator({ recorder: log });

    const result = await navigator.goto('About');
    expect(result).toEqual({
      ok: true,
      value: { from: 'Home', to: 'About', hops: ['Menu', 'Settings', 'About'] },
    });

    const help = await navigator.goto('Help');
    expect(help.ok && help.value.hops).toEqual(['Settings', 'Help']);

    // Help was opened from Settings, so its back button leads there
    expect(graph.route('Help', 'Settings')).toEqual(['Help', 'Settings']);
    expect(log.failures).toEqual([]);
  });
});
