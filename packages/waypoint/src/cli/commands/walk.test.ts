import { describe, test, expect } from 'vitest';
import { formatWalkMarkdown, formatWalkOutput } from './walk.ts';
import { DEVICE_PRESETS } from '../../config/index.ts';
import type { WalkResult } from '../../types.ts';

const result: WalkResult = {
  meta: {
    name: 'settings',
    description: 'Settings app',
    capturedAt: '2026-01-02T03:04:05.000Z',
    baseUrl: 'http://localhost:3000',
    device: DEVICE_PRESETS.mobile,
    outputDir: 'shots',
  },
  captured: [
    { scene: 'Home', path: 'shots/Home.png' },
    { scene: 'About', path: 'shots/About.png' },
  ],
  unreached: [],
  failures: [],
};

describe('formatWalkMarkdown', () => {
  test('renders the header and scene table', () => {
    expect(formatWalkMarkdown(result)).toBe(
      [
        '# Walk: settings',
        '',
        'Settings app',
        '',
        '**Base URL:** http://localhost:3000  ',
        '**Viewport:** 390x844  ',
        '**Captured:** 2026-01-02T03:04:05.000Z  ',
        '**Screenshots:** shots',
        '',
        '## Scenes',
        '',
        '| Scene | Screenshot      |',
        '|-------|-----------------|',
        '| Home  | shots/Home.png  |',
        '| About | shots/About.png |',
        '',
      ].join('\n')
    );
  });

  test('lists unreached scenes and failures', () => {
    const markdown = formatWalkMarkdown({
      ...result,
      unreached: ['Orphan'],
      failures: [
        {
          code: 'NO_ROUTE',
          message: 'Cannot route from About to Orphan',
          site: { file: 'runner.ts', line: 12 },
          expected: false,
        },
      ],
    });

    expect(markdown.endsWith(
      '## Unreached\n\n- Orphan\n\n## Failures\n\n- runner.ts:12: [NO_ROUTE] Cannot route from About to Orphan\n'
    )).toBe(true);
  });
});

describe('formatWalkOutput', () => {
  test('json output parses back to the result', () => {
    expect(JSON.parse(formatWalkOutput(result, 'json'))).toEqual(result);
  });
});
