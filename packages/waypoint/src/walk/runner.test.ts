import { describe, test, expect, vi } from 'vitest';
import { captureScenes, createScreenshotNamer, screenshotFileName, type SceneCapturer } from './runner.ts';
import { createSceneGraph } from '../graph/scene-graph.ts';
import { createFailureLog } from '../report/failures.ts';
import { ok, err } from '../result.ts';
import type { ArtifactError } from '../types.ts';

const buildGraph = () => {
  const graph = createSceneGraph({ initialScene: 'Home' });
  graph.createScene('Home', (scene) => scene.noop('Settings'));
  graph.createScene('Settings', (scene) => scene.noop('Home'));
  graph.createScene('Orphan', () => {});
  return graph;
};

describe('screenshotFileName', () => {
  test('keeps plain scene names', () => {
    expect(screenshotFileName('Settings_2')).toBe('Settings_2.png');
  });

  test('replaces characters unsafe in file names', () => {
    expect(screenshotFileName('Settings / Theme')).toBe('Settings-Theme.png');
  });
});

describe('createScreenshotNamer', () => {
  test('gives scenes that clean up alike their own files', () => {
    const fileName = createScreenshotNamer();

    expect(fileName('Home Page')).toBe('Home-Page.png');
    expect(fileName('Home-Page')).toBe('Home-Page-2.png');
    expect(fileName('Home/Page')).toBe('Home-Page-3.png');
    expect(fileName('About')).toBe('About.png');
  });

  test('a suffixed name does not take a later scene by surprise', () => {
    const fileName = createScreenshotNamer();

    expect(fileName('Home Page')).toBe('Home-Page.png');
    expect(fileName('Home-Page')).toBe('Home-Page-2.png');
    expect(fileName('Home-Page-2')).toBe('Home-Page-2-2.png');
  });

  test('each walk starts with a fresh set of names', () => {
    expect(createScreenshotNamer()('Home')).toBe('Home.png');
    expect(createScreenshotNamer()('Home')).toBe('Home.png');
  });
});

describe('captureScenes', () => {
  test('captures each reachable scene after arriving there', async () => {
    const graph = buildGraph();
    const log = createFailureLog();
    const navigator = graph.navigator({ recorder: log });
    const seenAt: string[] = [];
    const capture = vi.fn<SceneCapturer>(async (scene) => {
      seenAt.push(navigator.current);
      return ok(`shots/${scene}.png`);
    });

    const result = await captureScenes(navigator, graph.sceneNames(), capture);

    expect(result).toEqual({
      ok: true,
      value: {
        captured: [
          { scene: 'Home', path: 'shots/Home.png' },
          { scene: 'Settings', path: 'shots/Settings.png' },
        ],
        unreached: ['Orphan'],
      },
    });
    expect(seenAt).toEqual(['Home', 'Settings']);
    expect(log.failures.map((failure) => failure.code)).toEqual(['NO_ROUTE']);
  });

  test('visits repeated names once', async () => {
    const graph = buildGraph();
    const navigator = graph.navigator({ recorder: createFailureLog() });
    const capture = vi.fn<SceneCapturer>(async (scene) => ok(scene));

    await captureScenes(navigator, ['Settings', 'Settings', 'Home'], capture);

    expect(capture.mock.calls.map(([scene]) => scene)).toEqual(['Settings', 'Home']);
  });

  test('stops at the first capture that fails', async () => {
    const graph = buildGraph();
    const navigator = graph.navigator({ recorder: createFailureLog() });
    const diskFull: ArtifactError = { code: 'IO_FAILED', message: 'disk full', path: 'shots/Home.png' };
    const capture = vi.fn<SceneCapturer>(async (scene) => (scene === 'Home' ? err(diskFull) : ok(scene)));

    const result = await captureScenes(navigator, ['Home', 'Settings'], capture);

    expect(result).toEqual({ ok: false, error: diskFull });
    expect(capture).toHaveBeenCalledTimes(1);
    expect(navigator.current).toBe('Home');
  });
});
