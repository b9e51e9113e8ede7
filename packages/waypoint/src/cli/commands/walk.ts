/**
 * Walk command implementation.
 */

import type { OutputFormat, WalkCommand, WalkResult } from '../../types.ts';
import { loadConfig, getDeviceConfig, getWaitOptions } from '../../config/index.ts';
import { loadGraphDefinition, summarizeGraph } from '../../definition/index.ts';
import { createArtifactStore } from '../../artifacts/store.ts';
import { formatFailure } from '../../report/failures.ts';
import { walkGraph } from '../../walk/runner.ts';
import { formatTable } from '../format.ts';

export const formatWalkMarkdown = (result: WalkResult): string => {
  const { meta } = result;
  const sections = [
    `# Walk: ${meta.name}`,
    meta.description,
    [
      `**Base URL:** ${meta.baseUrl}  `,
      `**Viewport:** ${meta.device.viewport.width}x${meta.device.viewport.height}  `,
      `**Captured:** ${meta.capturedAt}  `,
      `**Screenshots:** ${meta.outputDir}`,
    ].join('\n'),
    '## Scenes',
    formatTable(
      ['Scene', 'Screenshot'],
      result.captured.map((capture) => [capture.scene, capture.path])
    ),
  ];

  if (result.unreached.length > 0) {
    sections.push('## Unreached', result.unreached.map((scene) => `- ${scene}`).join('\n'));
  }

  if (result.failures.length > 0) {
    sections.push('## Failures', result.failures.map((failure) => `- ${formatFailure(failure)}`).join('\n'));
  }

  return sections.join('\n\n') + '\n';
};

export const formatWalkOutput = (result: WalkResult, format: OutputFormat): string =>
  format === 'json' ? JSON.stringify(result, null, 2) : formatWalkMarkdown(result);

export const executeWalk = async (command: WalkCommand): Promise<number> => {
  const configResult = await loadConfig();
  if (!configResult.ok) {
    console.error(`Failed to load config: ${configResult.error.message}`);
    return 1;
  }
  const config = configResult.value;

  const device = getDeviceConfig(command.device, config);
  if (!device) {
    console.error(`Unknown device preset: ${command.device}`);
    return 1;
  }

  // Status messages go to stderr so stdout is clean for output
  console.error(`Loading graph: ${command.graphFile}...`);

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

  const outputDir = command.output ?? config.output.dir;
  console.error(`Walking graph: ${definition.name}`);
  console.error(`  Scenes: ${checked.value.scenes}`);
  console.error(`  Base URL: ${command.baseUrl}`);
  console.error(`  Screenshots: ${outputDir}`);
  console.error();

  const result = await walkGraph({
    definition,
    baseUrl: command.baseUrl,
    device,
    outputDir,
    wait: getWaitOptions(config),
  });

  if (!result.ok) {
    console.error(`Walk failed: ${result.error.message}`);
    return 1;
  }

  const output = formatWalkOutput(result.value, command.format);
  const written = await createArtifactStore(outputDir).write(
    command.format === 'json' ? 'walk.json' : 'walk.md',
    output
  );
  if (!written.ok) {
    console.error(`Failed to write report: ${written.error.message}`);
    return 1;
  }
  console.error(`Report written to ${written.value}`);
  console.log(output);

  return result.value.failures.length === 0 && result.value.unreached.length === 0 ? 0 : 1;
};
