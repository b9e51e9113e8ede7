/**
 * Screenshot walk: drive a real browser to every scene of a graph and keep a
 * screenshot of each one.
 */

import type {
  Result,
  ArtifactError,
  BrowserError,
  DeviceConfig,
  SceneCapture,
  WaitOptions,
  WalkResult,
} from '../types.ts';
import { ok, err } from '../result.ts';
import { launchBrowser, createContext, closeBrowser } from '../browser/launch.ts';
import { createArtifactStore } from '../artifacts/store.ts';
import { createPlaywrightDriver } from '../driver/playwright.ts';
import { DEFAULT_WAIT } from '../driver/element.ts';
import { instantiateGraph, type GraphDefinition } from '../definition/define.ts';
import { SceneGraphError } from '../graph/errors.ts';
import type { Navigator } from '../graph/navigator.ts';
import { createFailureLog } from '../report/failures.ts';

export interface WalkOptions {
  readonly definition: GraphDefinition;
  readonly baseUrl: string;
  readonly device: DeviceConfig;
  readonly outputDir: string;
  readonly wait?: WaitOptions;
}

/** Saves whatever is on screen for `scene`; resolves to the file written. */
export type SceneCapturer = (scene: string) => Promise<Result<string, ArtifactError>>;

export interface CapturePass {
  readonly captured: readonly SceneCapture[];
  readonly unreached: readonly string[];
}

const fileStem = (scene: string): string => scene.replace(/[^A-Za-z0-9_-]+/g, '-');

export const screenshotFileName = (scene: string): string => `${fileStem(scene)}.png`;

/**
 * Names screenshots for one walk. Scene names that clean up to the same file
 * name get a numeric suffix, so no screenshot overwrites another.
 */
export const createScreenshotNamer = (): ((scene: string) => string) => {
  const taken = new Set<string>();

  return (scene) => {
    const stem = fileStem(scene);
    let name = `${stem}.png`;
    for (let n = 2; taken.has(name); n++) {
      name = `${stem}-${n}.png`;
    }
    taken.add(name);
    return name;
  };
};

/**
 * Go to each scene in turn and capture it after arrival. A scene the
 * navigator cannot reach is skipped and the walk carries on from wherever the
 * navigator stopped; a capture that fails ends the pass.
 */
export const captureScenes = async (
  navigator: Navigator,
  names: readonly string[],
  capture: SceneCapturer
): Promise<Result<CapturePass, ArtifactError>> => {
  const captured: SceneCapture[] = [];
  const unreached: string[] = [];

  for (const scene of new Set(names)) {
    const route = await navigator.goto(scene);
    if (!route.ok) {
      unreached.push(scene);
      continue;
    }

    const saved = await capture(scene);
    if (!saved.ok) return saved;
    captured.push({ scene, path: saved.value });
  }

  return ok({ captured, unreached });
};

export const walkGraph = async (options: WalkOptions): Promise<Result<WalkResult, BrowserError>> => {
  const { definition, baseUrl, device, outputDir, wait = DEFAULT_WAIT } = options;

  const browserResult = await launchBrowser();
  if (!browserResult.ok) return browserResult;
  const browser = browserResult.value;

  try {
    const contextResult = await createContext(browser, { device, baseURL: baseUrl });
    if (!contextResult.ok) return contextResult;

    const page = await contextResult.value.newPage();
    await page.goto(definition.entry ?? '/');

    const store = createArtifactStore(outputDir);
    const log = createFailureLog();
    const graph = instantiateGraph(definition, createPlaywrightDriver(page));
    const navigator = graph.navigator({ recorder: log, wait });

    const fileName = createScreenshotNamer();
    const pass = await captureScenes(navigator, graph.sceneNames(), async (scene) =>
      store.write(fileName(scene), await page.screenshot())
    );
    if (!pass.ok) {
      return err({
        code: 'NAVIGATION_FAILED',
        message: `Cannot save screenshot: ${pass.error.message}`,
        cause: pass.error,
      });
    }

    return ok({
      meta: {
        name: definition.name,
        description: definition.description,
        capturedAt: new Date().toISOString(),
        baseUrl,
        device,
        outputDir,
      },
      captured: pass.value.captured,
      unreached: pass.value.unreached,
      failures: log.failures,
    });
  } catch (e) {
    if (e instanceof SceneGraphError) throw e;
    return err({
      code: 'NAVIGATION_FAILED',
      message: e instanceof Error ? e.message : 'Walk failed',
      cause: e,
    });
  } finally {
    await closeBrowser(browser);
  }
};
