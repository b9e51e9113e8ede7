/**
 * List command implementation.
 */

import type { ListCommand } from '../../types.ts';
import { loadConfig } from '../../config/index.ts';
import { findGraphFiles } from '../../definition/index.ts';

export const executeList = async (command: ListCommand): Promise<number> => {
  const configResult = await loadConfig();
  if (!configResult.ok) {
    console.error(`Failed to load config: ${configResult.error.message}`);
    return 1;
  }

  const { graphs } = configResult.value;
  const dir = command.dir ?? graphs.dir;
  const files = await findGraphFiles(dir, graphs.pattern);

  if (files.length === 0) {
    console.error(`No graph files matching ${graphs.pattern} in ${dir}`);
    return 0;
  }

  for (const file of files) {
    console.log(file);
  }
  return 0;
};
