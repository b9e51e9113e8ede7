/**
 * Validate command implementation.
 */

import type { ValidateCommand } from '../../types.ts';
import { validateGraphDefinition } from '../../definition/index.ts';

export const executeValidate = async (command: ValidateCommand): Promise<number> => {
  console.error(`Validating: ${command.graphFile}...`);

  const result = await validateGraphDefinition(command.graphFile);

  if (!result.ok) {
    console.error(`Validation failed: ${result.error.message}`);
    return 1;
  }

  const summary = result.value;
  console.log(`Valid graph definition`);
  console.log(`  Name: ${summary.name}`);
  console.log(`  Description: ${summary.description}`);
  console.log(`  Initial scene: ${summary.initialScene}`);
  console.log(`  Scenes: ${summary.scenes}`);
  console.log(`  Edges: ${summary.edges}`);

  if (summary.unreachable.length > 0) {
    console.log(`  Unreachable from ${summary.initialScene}: ${summary.unreachable.join(', ')}`);
  }

  return 0;
};
